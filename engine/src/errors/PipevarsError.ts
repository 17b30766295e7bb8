/**
 * Base pipevars Error Class
 *
 * Foundation for all engine errors with diagnostic capabilities.
 * Provides structured error information for the CLI, the action host
 * and the collected diagnostics of a resolution.
 *
 * ARCHITECTURE:
 * - Error codes (PV-X-NNN): structured codes for error identification
 * - Exit codes: process exit codes for hosts
 * - Severity levels: FATAL, ERROR, WARNING, INFO
 * - Context + hints: help users debug and fix inputs
 *
 * @module errors
 */

import {
  ExitCodes,
  PipevarsErrorCode,
  ErrorSeverity,
  getErrorCategory,
  getErrorDescription,
  getExitCodeForError,
  getSuggestedAction,
} from './ErrorCodes.js';

/**
 * Diagnostic error information
 */
export interface PipevarsErrorDiagnostic {
  /** Structured error code (e.g., PV-X-001) */
  code: PipevarsErrorCode;

  /** Human-readable error message */
  message: string;

  /** Process exit code for hosts */
  exitCode?: ExitCodes;

  /** Where the error happened (e.g., "jinja_inputs:3" or "pr-source-git-branch") */
  path?: string;

  /** Optional suggestion for fixing the error */
  hint?: string;

  /** Error severity */
  severity: ErrorSeverity;

  /** Additional context data for debugging */
  context?: Record<string, unknown>;

  /** Underlying error, if any */
  cause?: unknown;
}

/**
 * Base error class for all pipevars errors
 *
 * @example
 * ```typescript
 * throw new PipevarsError({
 *   code: PipevarsErrorCode.INVOCATION_INVALID_BOOLEAN,
 *   message: 'Input "log_outputs" must be a boolean',
 *   path: 'log_outputs',
 *   severity: ErrorSeverity.FATAL,
 * });
 * ```
 */
export class PipevarsError extends Error {
  /** Error diagnostic information */
  public readonly diagnostic: PipevarsErrorDiagnostic & { exitCode: ExitCodes };

  /** Timestamp when error occurred */
  public readonly timestamp: Date;

  constructor(diagnostic: PipevarsErrorDiagnostic) {
    super(diagnostic.message, diagnostic.cause !== undefined ? { cause: diagnostic.cause } : undefined);
    this.name = getErrorCategory(diagnostic.code).replace(/\s+/g, '');
    this.diagnostic = {
      ...diagnostic,
      exitCode: diagnostic.exitCode ?? getExitCodeForError(diagnostic.code),
      hint: diagnostic.hint || getSuggestedAction(diagnostic.code),
    };
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get code(): PipevarsErrorCode {
    return this.diagnostic.code;
  }

  get exitCode(): ExitCodes {
    return this.diagnostic.exitCode;
  }

  get path(): string | undefined {
    return this.diagnostic.path;
  }

  get hint(): string | undefined {
    return this.diagnostic.hint;
  }

  get severity(): ErrorSeverity {
    return this.diagnostic.severity;
  }

  get description(): string {
    return getErrorDescription(this.code);
  }

  get category(): string {
    return getErrorCategory(this.code);
  }

  /**
   * Format error as string for logging/display
   */
  toString(): string {
    let msg = `${this.name} [${this.code}]`;

    if (this.path) {
      msg += ` at ${this.path}`;
    }

    msg += `: ${this.message}`;

    if (this.hint) {
      msg += ` (hint: ${this.hint})`;
    }

    return msg;
  }

  /**
   * Convert to JSON for structured logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      code: this.code,
      exitCode: this.exitCode,
      message: this.message,
      path: this.path,
      hint: this.hint,
      severity: this.severity,
      context: this.diagnostic.context,
      timestamp: this.timestamp.toISOString(),
    };
  }

  /**
   * Simplified object for CLI display and action annotations
   */
  toSimpleObject(): {
    code: string;
    severity: ErrorSeverity;
    message: string;
    hint?: string;
    path?: string;
  } {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      hint: this.hint,
      path: this.path,
    };
  }
}

/**
 * Describe any thrown value in one line
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
