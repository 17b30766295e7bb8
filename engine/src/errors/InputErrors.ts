/**
 * Input Errors
 *
 * Errors raised while reading what the user wrote: the step's own input
 * declarations (fatal) and individual `name=value` lines (recovered).
 *
 * USAGE:
 * =====
 * ```typescript
 * // ❌ Bad: Generic error
 * throw new Error('bad line');
 *
 * // ✅ Good: Structured error with diagnostics
 * diagnostics.push(AssignmentError.missingEquals('static_inputs', 4, 'username'));
 * ```
 *
 * @module errors
 */

import { PipevarsError, type PipevarsErrorDiagnostic } from './PipevarsError.js';
import { PipevarsErrorCode, ErrorSeverity, ExitCodes } from './ErrorCodes.js';

/**
 * MalformedAssignment: one line of a `name=value` block could not be parsed.
 * The line is skipped; the rest of the block is still parsed.
 */
export class AssignmentError extends PipevarsError {
  constructor(diagnostic: Omit<PipevarsErrorDiagnostic, 'severity'>) {
    super({ ...diagnostic, severity: ErrorSeverity.WARNING });
  }

  /**
   * Line has no `=` separator
   *
   * @param block - Input block name (e.g. "static_inputs")
   * @param line - 1-based line number
   * @param text - The offending line
   */
  static missingEquals(block: string, line: number, text: string): AssignmentError {
    return new AssignmentError({
      code: PipevarsErrorCode.ASSIGNMENT_MISSING_EQUALS,
      message: `Line ${line} of ${block} has no "=": ${JSON.stringify(text)}`,
      path: `${block}:${line}`,
      context: { block, line, text },
    });
  }

  /**
   * Name before `=` is empty or contains unsupported characters
   */
  static invalidName(block: string, line: number, name: string): AssignmentError {
    return new AssignmentError({
      code: PipevarsErrorCode.ASSIGNMENT_INVALID_NAME,
      message: name
        ? `Line ${line} of ${block} declares an invalid variable name "${name}"`
        : `Line ${line} of ${block} has an empty variable name`,
      path: `${block}:${line}`,
      context: { block, line, name },
    });
  }

  /**
   * Value opens a quote that never closes
   */
  static unterminatedQuote(block: string, line: number, name: string, quote: string): AssignmentError {
    return new AssignmentError({
      code: PipevarsErrorCode.ASSIGNMENT_UNTERMINATED_QUOTE,
      message: `Value of "${name}" on line ${line} of ${block} opens ${quote} but never closes it`,
      path: `${block}:${line}`,
      hint: `End the value with ${quote}, or drop the opening ${quote}`,
      context: { block, line, name, quote },
    });
  }
}

/**
 * Structural failure of the step's own input declarations.
 * This is the only fatal error class: the run stops with a non-zero exit.
 */
export class InvocationError extends PipevarsError {
  constructor(diagnostic: Omit<PipevarsErrorDiagnostic, 'severity'>) {
    super({
      ...diagnostic,
      severity: ErrorSeverity.FATAL,
      exitCode: diagnostic.exitCode ?? ExitCodes.INVALID_INPUT,
    });
  }

  static invalidBoolean(input: string, received: string): InvocationError {
    return new InvocationError({
      code: PipevarsErrorCode.INVOCATION_INVALID_BOOLEAN,
      message: `Input "${input}" must be a boolean, received ${JSON.stringify(received)}`,
      path: input,
      context: { input, received },
    });
  }

  static invalidNumber(input: string, received: string): InvocationError {
    return new InvocationError({
      code: PipevarsErrorCode.INVOCATION_INVALID_NUMBER,
      message: `Input "${input}" must be a positive whole number, received ${JSON.stringify(received)}`,
      path: input,
      context: { input, received },
    });
  }

  static invalidShape(path: string, detail: string): InvocationError {
    return new InvocationError({
      code: PipevarsErrorCode.INVOCATION_INVALID_SHAPE,
      message: `Invalid step inputs at "${path}": ${detail}`,
      path,
      context: { detail },
    });
  }

  static invalidPayload(source: string, detail: string, cause?: unknown): InvocationError {
    return new InvocationError({
      code: PipevarsErrorCode.INVOCATION_INVALID_PAYLOAD,
      message: `Event payload from ${source} is not usable: ${detail}`,
      path: source,
      context: { detail },
      cause,
    });
  }
}
