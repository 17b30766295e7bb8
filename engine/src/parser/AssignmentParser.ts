/**
 * Assignment Parser
 *
 * Splits multiline `name=value` text into ordered raw assignments.
 *
 * Rules:
 * - blank lines and lines starting with `#` are skipped
 * - the first `=` separates name and value; later `=` belong to the value
 * - in `static` mode the value is trimmed and one pair of matching
 *   surrounding quotes is removed
 * - in `expression` mode the value is only trimmed (quotes are part of the
 *   expression)
 * - a bad line yields an AssignmentError and parsing continues
 *
 * Empty values are kept: downstream coalescing treats them as empty
 * candidates, which is different from a name that was never declared.
 *
 * @module parser
 */

import { AssignmentError } from '../errors/InputErrors.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import type { RawAssignment } from '../types/core-types.js';

/**
 * How values are read
 */
export type AssignmentMode = 'static' | 'expression';

/**
 * Parse result: assignments in declaration order plus per-line errors
 */
export interface AssignmentParseResult {
  assignments: RawAssignment[];
  errors: AssignmentError[];
}

/**
 * Valid variable names. Dots and dashes are allowed so that names like
 * `app.version` or `release-tag` can be declared; only names without them
 * can be referenced directly inside expressions.
 */
const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

const QUOTES = ['"', "'"] as const;

export class AssignmentParser {
  /**
   * Parse a block of `name=value` lines
   *
   * @param text - Raw multiline input (may be empty)
   * @param block - Input name used in diagnostics (e.g. "static_inputs")
   * @param mode - Value handling mode
   */
  static parse(text: string, block: string, mode: AssignmentMode = 'static'): AssignmentParseResult {
    const assignments: RawAssignment[] = [];
    const errors: AssignmentError[] = [];

    const lines = text.split(/\r?\n/);
    lines.forEach((rawLine, index) => {
      const line = index + 1;
      const trimmed = rawLine.trim();

      if (trimmed === '' || trimmed.startsWith('#')) {
        return;
      }

      const separator = trimmed.indexOf('=');
      if (separator === -1) {
        errors.push(AssignmentError.missingEquals(block, line, trimmed));
        return;
      }

      const name = trimmed.slice(0, separator).trim();
      if (!NAME_PATTERN.test(name)) {
        errors.push(AssignmentError.invalidName(block, line, name));
        return;
      }

      const value = trimmed.slice(separator + 1).trim();
      if (mode === 'expression') {
        assignments.push({ name, rawValue: value, line });
        return;
      }

      const unquoted = this.unquote(value);
      if (unquoted === null) {
        errors.push(AssignmentError.unterminatedQuote(block, line, name, value.charAt(0)));
        return;
      }

      assignments.push({ name, rawValue: unquoted, line });
    });

    LoggerManager.tryGetLogger()?.debug(
      `Parsed ${assignments.length} assignment(s) from ${block}`,
      { block, assignments: assignments.length, errors: errors.length },
      'analysis',
      'AssignmentParser'
    );

    return { assignments, errors };
  }

  /**
   * Remove one pair of matching surrounding quotes.
   * Returns null when the value opens a quote it never closes.
   */
  static unquote(value: string): string | null {
    const first = value.charAt(0);
    const quote = QUOTES.find(q => q === first);
    if (!quote) {
      return value;
    }
    if (value.length >= 2 && value.endsWith(quote)) {
      return value.slice(1, -1);
    }
    return null;
  }
}
