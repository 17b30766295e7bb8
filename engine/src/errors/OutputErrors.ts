/**
 * Output Errors
 *
 * Diagnostics of the merge and projection phase. None of them stop a run.
 *
 * @module errors
 */

import { PipevarsError } from './PipevarsError.js';
import { PipevarsErrorCode, ErrorSeverity } from './ErrorCodes.js';

export class OutputCollision extends PipevarsError {
  /**
   * A user-declared name equals a reserved output; the reserved output wins
   */
  static shadowed(name: string): OutputCollision {
    return new OutputCollision({
      code: PipevarsErrorCode.OUTPUT_SHADOWED_NAME,
      message: `Variable "${name}" is shadowed by the reserved output of the same name`,
      path: name,
      severity: ErrorSeverity.WARNING,
      context: { name },
    });
  }

  /**
   * A user-declared value replaces a standard-context value
   */
  static overridesStandard(name: string, standardValue: unknown): OutputCollision {
    return new OutputCollision({
      code: PipevarsErrorCode.OUTPUT_STANDARD_OVERRIDE,
      message: `Variable "${name}" overrides the standard value ${JSON.stringify(standardValue)}`,
      path: name,
      severity: ErrorSeverity.INFO,
      context: { name, standardValue },
    });
  }
}
