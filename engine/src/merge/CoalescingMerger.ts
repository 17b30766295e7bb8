/**
 * Coalescing Merger
 *
 * Turns the candidate table into the ResultSet. The first non-empty
 * candidate wins, where empty means null or the empty string; `false` and
 * `0` are values. When every candidate is empty the result is `''` if any
 * candidate was `''`, otherwise null.
 *
 * @module merge
 */

import { OutputCollision } from '../errors/OutputErrors.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import {
  VariableSource,
  type Candidate,
  type ResolvedVariable,
  type ResultSet,
  type ScalarValue,
} from '../types/core-types.js';
import type { CandidateTable } from './CandidateTable.js';

export interface CoalesceResult {
  value: ScalarValue;
  /** Candidate that supplied the value; null when every candidate was empty */
  winner: Candidate | null;
}

export interface MergeResult {
  resultSet: ResultSet;
  /** Overrides of standard values (info) */
  diagnostics: OutputCollision[];
}

export function isEmptyValue(value: ScalarValue): boolean {
  return value === null || value === '';
}

export function coalesce(candidates: readonly Candidate[]): CoalesceResult {
  const winner = candidates.find(candidate => !isEmptyValue(candidate.value));
  if (winner) {
    return { value: winner.value, winner };
  }
  return {
    value: candidates.some(candidate => candidate.value === '') ? '' : null,
    winner: null,
  };
}

export class CoalescingMerger {
  /**
   * Merge the table into a ResultSet
   *
   * @param fixed - Entries that replace whatever the table resolves for
   *   their name (the `var1`..`var3` expressions). A fixed name the user
   *   also declared keeps its position; others follow the user names.
   */
  static merge(table: CandidateTable, fixed: readonly ResolvedVariable[] = []): MergeResult {
    const logger = LoggerManager.tryGetLogger();
    const entries = new Map<string, ResolvedVariable>();
    const diagnostics: OutputCollision[] = [];

    const resolve = (name: string): void => {
      const candidates = table.candidates(name);
      const { value, winner } = coalesce(candidates);
      const source = winner?.source ?? candidates[0]?.source ?? VariableSource.STATIC;

      if (winner && winner.source !== VariableSource.STANDARD_CONTEXT) {
        const standard = candidates.find(
          candidate => candidate.source === VariableSource.STANDARD_CONTEXT && candidate.value !== null
        );
        if (standard && standard.value !== value) {
          const override = OutputCollision.overridesStandard(name, standard.value);
          logger?.info(override.message, { name, source: winner.source }, 'output', 'CoalescingMerger');
          diagnostics.push(override);
        }
      }

      entries.set(name, { name, value, source, candidates });
    };

    // User names, then fixed entries the user never declared, then standard names
    table.userNames().forEach(resolve);
    for (const entry of fixed) {
      entries.set(entry.name, entry);
    }
    table.standardOnlyNames().forEach(resolve);

    logger?.debug(`Merged ${entries.size} variable(s)`, {
      user: table.userNames().length,
      fixed: fixed.map(entry => entry.name),
    }, 'output', 'CoalescingMerger');

    return { resultSet: entries, diagnostics };
  }
}
