/**
 * Expression Errors
 *
 * Raised while parsing or evaluating one expression. Each error carries the
 * offending expression text; the engine recovers per expression and resolves
 * the affected output to null.
 *
 * @module errors
 */

import { PipevarsError, type PipevarsErrorDiagnostic } from './PipevarsError.js';
import { PipevarsErrorCode, ErrorSeverity } from './ErrorCodes.js';
import { closestName } from './TypoDetector.js';

export class ExpressionError extends PipevarsError {
  /** Expression text that failed */
  public readonly expression: string;

  constructor(expression: string, diagnostic: Omit<PipevarsErrorDiagnostic, 'severity'>) {
    super({
      ...diagnostic,
      severity: ErrorSeverity.ERROR,
      context: { expression, ...diagnostic.context },
    });
    this.expression = expression;
  }

  /**
   * Return a copy of this error located at `path` (e.g. "jinja_inputs:2")
   */
  at(path: string): ExpressionError {
    return new ExpressionError(this.expression, {
      code: this.code,
      message: this.message,
      path,
      hint: this.hint,
      context: this.diagnostic.context,
      cause: this.diagnostic.cause,
    });
  }

  static syntax(expression: string, detail: string, position?: number): ExpressionError {
    const where = position !== undefined ? ` at column ${position + 1}` : '';
    return new ExpressionError(expression, {
      code: PipevarsErrorCode.EXPRESSION_SYNTAX,
      message: `Syntax error${where}: ${detail}`,
      context: { position },
    });
  }

  static undefinedAccess(expression: string, name: string, operation: string): ExpressionError {
    return new ExpressionError(expression, {
      code: PipevarsErrorCode.EXPRESSION_UNDEFINED_ACCESS,
      message: `"${name}" is undefined and cannot be used for ${operation}`,
      hint: `Use "${name} is defined" or "${name} | default('...')" to guard it`,
      context: { name, operation },
    });
  }

  static typeMismatch(expression: string, operator: string, left: string, right: string): ExpressionError {
    return new ExpressionError(expression, {
      code: PipevarsErrorCode.EXPRESSION_TYPE_MISMATCH,
      message: `Unsupported operand types for ${operator}: ${left} and ${right}`,
      context: { operator, left, right },
    });
  }

  static unknownFilter(expression: string, filter: string, available: string[]): ExpressionError {
    const suggestion = closestName(filter, available);
    return new ExpressionError(expression, {
      code: PipevarsErrorCode.EXPRESSION_UNKNOWN_FILTER,
      message: `No filter named "${filter}"`,
      hint: suggestion
        ? `Did you mean "${suggestion}"?`
        : `Available filters: ${available.join(', ')}`,
      context: { filter },
    });
  }

  static unknownTest(expression: string, test: string, available: string[]): ExpressionError {
    const suggestion = closestName(test, available);
    return new ExpressionError(expression, {
      code: PipevarsErrorCode.EXPRESSION_UNKNOWN_TEST,
      message: `No test named "${test}"`,
      hint: suggestion
        ? `Did you mean "${suggestion}"?`
        : `Available tests: ${available.join(', ')}`,
      context: { test },
    });
  }

  static unsupported(expression: string, construct: string): ExpressionError {
    return new ExpressionError(expression, {
      code: PipevarsErrorCode.EXPRESSION_UNSUPPORTED,
      message: `${construct} is not supported in expressions`,
      context: { construct },
    });
  }

  static divisionByZero(expression: string): ExpressionError {
    return new ExpressionError(expression, {
      code: PipevarsErrorCode.EXPRESSION_DIVISION_BY_ZERO,
      message: 'Division by zero',
    });
  }

  static invalidArgument(expression: string, filter: string, detail: string): ExpressionError {
    return new ExpressionError(expression, {
      code: PipevarsErrorCode.EXPRESSION_TYPE_MISMATCH,
      message: `Filter "${filter}": ${detail}`,
      context: { filter },
    });
  }
}
