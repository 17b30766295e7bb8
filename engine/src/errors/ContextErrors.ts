/**
 * Context Errors
 *
 * Errors of the standard-context layer: metadata lookups for dispatch
 * auto-detection (recovered, the overlay is skipped), nullability violations
 * (fatal in strict mode, coerced to null otherwise) and catalog problems.
 *
 * @module errors
 */

import { PipevarsError, type PipevarsErrorDiagnostic } from './PipevarsError.js';
import { PipevarsErrorCode, ErrorSeverity } from './ErrorCodes.js';
import type { TriggerType } from '../types/core-types.js';

/**
 * Kind of object a metadata lookup targets
 */
export type FetchKind = 'pr' | 'issue' | 'comment';

export class ContextFetchError extends PipevarsError {
  constructor(diagnostic: Omit<PipevarsErrorDiagnostic, 'severity'>) {
    super({ ...diagnostic, severity: ErrorSeverity.WARNING });
  }

  static notFound(kind: FetchKind, id: string): ContextFetchError {
    return new ContextFetchError({
      code: PipevarsErrorCode.CONTEXT_NOT_FOUND,
      message: `${describeKind(kind)} ${id} was not found`,
      path: `${kind}:${id}`,
      context: { kind, id },
    });
  }

  static timeout(kind: FetchKind, id: string, timeoutMs: number): ContextFetchError {
    return new ContextFetchError({
      code: PipevarsErrorCode.CONTEXT_TIMEOUT,
      message: `Lookup of ${describeKind(kind).toLowerCase()} ${id} timed out after ${timeoutMs}ms`,
      path: `${kind}:${id}`,
      context: { kind, id, timeoutMs },
    });
  }

  static requestFailed(kind: FetchKind, id: string, cause: unknown): ContextFetchError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new ContextFetchError({
      code: PipevarsErrorCode.CONTEXT_REQUEST_FAILED,
      message: `Lookup of ${describeKind(kind).toLowerCase()} ${id} failed: ${detail}`,
      path: `${kind}:${id}`,
      context: { kind, id },
      cause,
    });
  }
}

/**
 * A standard variable produced a value where its trigger type demands null.
 * Indicates a catalog or payload-shape bug.
 */
export class NullabilityViolation extends PipevarsError {
  constructor(name: string, trigger: TriggerType, value: unknown, strict: boolean) {
    super({
      code: PipevarsErrorCode.CONTEXT_NULLABILITY_VIOLATION,
      message: `Standard variable "${name}" must be null for ${trigger} events but resolved to ${JSON.stringify(value)}`,
      path: name,
      severity: strict ? ErrorSeverity.FATAL : ErrorSeverity.WARNING,
      context: { name, trigger, value },
    });
  }
}

export class CatalogError extends PipevarsError {
  constructor(detail: string) {
    super({
      code: PipevarsErrorCode.CONTEXT_CATALOG_INVALID,
      message: `Standard-context catalog is invalid: ${detail}`,
      severity: ErrorSeverity.FATAL,
    });
  }
}

function describeKind(kind: FetchKind): string {
  switch (kind) {
    case 'pr':
      return 'Pull request';
    case 'issue':
      return 'Issue';
    case 'comment':
      return 'Comment';
  }
}
