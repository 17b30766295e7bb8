/**
 * pipevars Error Codes
 *
 * Structured diagnostic codes for the resolution engine, and the process
 * exit codes hosts use when a run cannot complete.
 *
 * TWO-LAYER SYSTEM:
 * ================
 * 1. Exit Codes: process termination codes for the CLI and the action host
 * 2. Error Codes (PV-X-NNN): precise identification of what went wrong,
 *    mapped to an exit code by getExitCodeForError()
 *
 * Format: PV-[Category]-[Number]
 *
 * Categories:
 * - I: Invocation errors (the step's own input declarations)
 * - A: Assignment errors (a `name=value` line)
 * - X: Expression errors (parsing or evaluating one expression)
 * - C: Context errors (standard context, metadata lookups, nullability)
 * - O: Output errors (name collisions, overrides)
 * - R: Runtime errors (bugs)
 *
 * ADDING NEW ERRORS:
 * =================
 * 1. Add error code enum value below
 * 2. Add description in getErrorDescription()
 * 3. Add suggested action in getSuggestedAction()
 * 4. Add a factory method to the matching error class
 *
 * @module errors
 */

/**
 * Process exit codes
 */
export enum ExitCodes {
  SUCCESS = 0,
  /** Value-level errors occurred and the run was asked to fail on them */
  RESOLUTION_FAILED = 1,
  /** The invocation's own inputs could not be parsed */
  INVALID_INPUT = 2,
  /** A file the CLI was pointed at is missing or unreadable */
  FILE_ERROR = 3,
  /** Internal error (bug) */
  INTERNAL_ERROR = 4,
}

export enum PipevarsErrorCode {
  // ============================================================================
  // INVOCATION ERRORS (I) - fatal, exit code INVALID_INPUT
  // ============================================================================

  /** Boolean input is not one of the accepted literals */
  INVOCATION_INVALID_BOOLEAN = 'PV-I-001',

  /** Numeric input is not a positive integer */
  INVOCATION_INVALID_NUMBER = 'PV-I-002',

  /** Input object has the wrong shape */
  INVOCATION_INVALID_SHAPE = 'PV-I-003',

  /** Event payload is not a JSON object */
  INVOCATION_INVALID_PAYLOAD = 'PV-I-004',

  // ============================================================================
  // ASSIGNMENT ERRORS (A) - recovered, the line is skipped
  // ============================================================================

  /** Line has no `=` */
  ASSIGNMENT_MISSING_EQUALS = 'PV-A-001',

  /** Name is empty or contains unsupported characters */
  ASSIGNMENT_INVALID_NAME = 'PV-A-002',

  /** Value opens a quote that is never closed */
  ASSIGNMENT_UNTERMINATED_QUOTE = 'PV-A-003',

  // ============================================================================
  // EXPRESSION ERRORS (X) - recovered, the output resolves to null
  // ============================================================================

  /** Expression text cannot be parsed */
  EXPRESSION_SYNTAX = 'PV-X-001',

  /** Attribute or operator applied to an undefined value */
  EXPRESSION_UNDEFINED_ACCESS = 'PV-X-002',

  /** Operator applied to incompatible types */
  EXPRESSION_TYPE_MISMATCH = 'PV-X-003',

  /** Filter name is not available */
  EXPRESSION_UNKNOWN_FILTER = 'PV-X-004',

  /** Test name is not available */
  EXPRESSION_UNKNOWN_TEST = 'PV-X-005',

  /** Construct outside the sandboxed grammar (e.g. function calls) */
  EXPRESSION_UNSUPPORTED = 'PV-X-006',

  /** Division or modulo by zero */
  EXPRESSION_DIVISION_BY_ZERO = 'PV-X-007',

  // ============================================================================
  // CONTEXT ERRORS (C)
  // ============================================================================

  /** Referenced PR/issue/comment does not exist */
  CONTEXT_NOT_FOUND = 'PV-C-001',

  /** Metadata lookup exceeded its time limit */
  CONTEXT_TIMEOUT = 'PV-C-002',

  /** Metadata lookup failed for another reason */
  CONTEXT_REQUEST_FAILED = 'PV-C-003',

  /** A value was produced where the trigger type requires null */
  CONTEXT_NULLABILITY_VIOLATION = 'PV-C-004',

  /** Standard-context catalog data does not match its schema */
  CONTEXT_CATALOG_INVALID = 'PV-C-005',

  // ============================================================================
  // OUTPUT ERRORS (O)
  // ============================================================================

  /** User-declared name collides with a reserved output */
  OUTPUT_SHADOWED_NAME = 'PV-O-001',

  /** User-declared value replaces a standard-context value */
  OUTPUT_STANDARD_OVERRIDE = 'PV-O-002',
}

/**
 * Error severity levels
 *
 * - FATAL: the run cannot produce outputs
 * - ERROR: a value could not be resolved (the run continues)
 * - WARNING: something was skipped or degraded
 * - INFO: noteworthy decision, nothing lost
 */
export enum ErrorSeverity {
  FATAL = 'fatal',
  ERROR = 'error',
  WARNING = 'warning',
  INFO = 'info',
}

/**
 * Get human-readable category name from error code
 *
 * @example
 * ```typescript
 * getErrorCategory(PipevarsErrorCode.EXPRESSION_SYNTAX); // "Expression Error"
 * ```
 */
export function getErrorCategory(code: PipevarsErrorCode): string {
  if (code.startsWith('PV-I-')) return 'Invocation Error';
  if (code.startsWith('PV-A-')) return 'Assignment Error';
  if (code.startsWith('PV-X-')) return 'Expression Error';
  if (code.startsWith('PV-C-')) return 'Context Error';
  if (code.startsWith('PV-O-')) return 'Output Error';
  return 'Unknown Error';
}

/**
 * Get detailed description for an error code
 */
export function getErrorDescription(code: PipevarsErrorCode): string {
  const descriptions: Record<PipevarsErrorCode, string> = {
    [PipevarsErrorCode.INVOCATION_INVALID_BOOLEAN]: 'A boolean input must be one of: true, True, TRUE, false, False, FALSE.',
    [PipevarsErrorCode.INVOCATION_INVALID_NUMBER]: 'A numeric input must be a positive whole number.',
    [PipevarsErrorCode.INVOCATION_INVALID_SHAPE]: 'The step inputs do not have the expected structure.',
    [PipevarsErrorCode.INVOCATION_INVALID_PAYLOAD]: 'The event payload must be a JSON object.',

    [PipevarsErrorCode.ASSIGNMENT_MISSING_EQUALS]: 'Each non-comment line must have the form name=value.',
    [PipevarsErrorCode.ASSIGNMENT_INVALID_NAME]: 'Variable names start with a letter or underscore and contain letters, digits, "_", "-" or ".".',
    [PipevarsErrorCode.ASSIGNMENT_UNTERMINATED_QUOTE]: 'A quoted value must end with the same quote character it starts with.',

    [PipevarsErrorCode.EXPRESSION_SYNTAX]: 'The expression could not be parsed.',
    [PipevarsErrorCode.EXPRESSION_UNDEFINED_ACCESS]: 'An attribute or operator was applied to an undefined variable.',
    [PipevarsErrorCode.EXPRESSION_TYPE_MISMATCH]: 'An operator was applied to values of incompatible types.',
    [PipevarsErrorCode.EXPRESSION_UNKNOWN_FILTER]: 'The filter is not one of the built-in filters.',
    [PipevarsErrorCode.EXPRESSION_UNKNOWN_TEST]: 'The test is not one of the built-in tests.',
    [PipevarsErrorCode.EXPRESSION_UNSUPPORTED]: 'The expression uses a construct that is not available in the sandbox.',
    [PipevarsErrorCode.EXPRESSION_DIVISION_BY_ZERO]: 'The expression divides by zero.',

    [PipevarsErrorCode.CONTEXT_NOT_FOUND]: 'The referenced pull request, issue or comment does not exist.',
    [PipevarsErrorCode.CONTEXT_TIMEOUT]: 'The metadata lookup did not finish in time.',
    [PipevarsErrorCode.CONTEXT_REQUEST_FAILED]: 'The metadata lookup failed.',
    [PipevarsErrorCode.CONTEXT_NULLABILITY_VIOLATION]: 'A standard variable received a value for a trigger type that requires null. This is a bug.',
    [PipevarsErrorCode.CONTEXT_CATALOG_INVALID]: 'The standard-context catalog is malformed. This is a bug.',

    [PipevarsErrorCode.OUTPUT_SHADOWED_NAME]: 'A user-declared variable uses a reserved output name; the reserved output wins.',
    [PipevarsErrorCode.OUTPUT_STANDARD_OVERRIDE]: 'A user-declared variable replaces a standard-context value of the same name.',
  };

  return descriptions[code] || 'Unknown error occurred';
}

/**
 * Map an error code to the process exit code a host should use
 */
export function getExitCodeForError(code: PipevarsErrorCode): ExitCodes {
  if (code.startsWith('PV-I-')) {
    return ExitCodes.INVALID_INPUT;
  }
  if (code === PipevarsErrorCode.CONTEXT_CATALOG_INVALID) {
    return ExitCodes.INTERNAL_ERROR;
  }
  return ExitCodes.RESOLUTION_FAILED;
}

/**
 * Get suggested action for an error code
 */
export function getSuggestedAction(code: PipevarsErrorCode): string {
  const actions: Record<PipevarsErrorCode, string> = {
    [PipevarsErrorCode.INVOCATION_INVALID_BOOLEAN]: 'Use true or false',
    [PipevarsErrorCode.INVOCATION_INVALID_NUMBER]: 'Use a whole number such as 10000',
    [PipevarsErrorCode.INVOCATION_INVALID_SHAPE]: 'Pass every input as a string',
    [PipevarsErrorCode.INVOCATION_INVALID_PAYLOAD]: 'Point the event path at a JSON object file',

    [PipevarsErrorCode.ASSIGNMENT_MISSING_EQUALS]: 'Write the line as name=value, or start it with # to comment it out',
    [PipevarsErrorCode.ASSIGNMENT_INVALID_NAME]: 'Rename the variable, e.g. my_var',
    [PipevarsErrorCode.ASSIGNMENT_UNTERMINATED_QUOTE]: 'Close the quote or remove it',

    [PipevarsErrorCode.EXPRESSION_SYNTAX]: 'Check quotes, parentheses and operators',
    [PipevarsErrorCode.EXPRESSION_UNDEFINED_ACCESS]: 'Guard the variable with "is defined" or the default filter',
    [PipevarsErrorCode.EXPRESSION_TYPE_MISMATCH]: 'Convert values with the string, int or float filters, or use ~ to join text',
    [PipevarsErrorCode.EXPRESSION_UNKNOWN_FILTER]: 'Use one of the built-in filters',
    [PipevarsErrorCode.EXPRESSION_UNKNOWN_TEST]: 'Use one of the built-in tests',
    [PipevarsErrorCode.EXPRESSION_UNSUPPORTED]: 'Use filters instead of function or method calls',
    [PipevarsErrorCode.EXPRESSION_DIVISION_BY_ZERO]: 'Guard the divisor with a condition',

    [PipevarsErrorCode.CONTEXT_NOT_FOUND]: 'Check the number passed to the workflow dispatch input',
    [PipevarsErrorCode.CONTEXT_TIMEOUT]: 'Raise fetch_timeout_ms or retry the run',
    [PipevarsErrorCode.CONTEXT_REQUEST_FAILED]: 'Check the token permissions for pull requests and issues',
    [PipevarsErrorCode.CONTEXT_NULLABILITY_VIOLATION]: 'Report the event payload that produced this warning',
    [PipevarsErrorCode.CONTEXT_CATALOG_INVALID]: 'Report the catalog validation message',

    [PipevarsErrorCode.OUTPUT_SHADOWED_NAME]: 'Rename the variable; reserved outputs are all, custom, var1, var2 and var3',
    [PipevarsErrorCode.OUTPUT_STANDARD_OVERRIDE]: 'Rename the variable if the standard value was meant to be kept',
  };

  return actions[code] || 'Review error details';
}
