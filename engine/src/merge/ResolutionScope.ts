/**
 * Scope that expressions are evaluated in: the currently coalesced value
 * of every declared name, standard names also reachable with `_` in place
 * of `-`, and the event payload as `event`.
 *
 * @module merge
 */

import type { EvaluationScope } from '../expression/Evaluator.js';
import { fromUnknown, type JinjaValue } from '../expression/values.js';
import type { JsonObject } from '../types/core-types.js';
import type { CandidateTable } from './CandidateTable.js';
import { coalesce } from './CoalescingMerger.js';

export const EVENT_NAME = 'event';

export class ResolutionScope implements EvaluationScope {
  private readonly event: JinjaValue;

  constructor(
    private readonly table: CandidateTable,
    payload: JsonObject
  ) {
    this.event = fromUnknown(payload, EVENT_NAME);
  }

  lookup(name: string): JinjaValue | undefined {
    if (this.table.has(name)) {
      return coalesce(this.table.candidates(name)).value;
    }
    if (name === EVENT_NAME) {
      return this.event;
    }
    const dashed = name.replace(/_/g, '-');
    if (dashed !== name && this.table.isStandard(dashed)) {
      return coalesce(this.table.candidates(dashed)).value;
    }
    return undefined;
  }
}
