/**
 * Map-backed evaluation scope
 *
 * @module expression
 */

import type { EvaluationScope } from './Evaluator.js';
import { fromUnknown, type JinjaValue } from './values.js';

export class MapScope implements EvaluationScope {
  private readonly values = new Map<string, JinjaValue>();

  constructor(entries: Record<string, unknown> = {}) {
    for (const [name, value] of Object.entries(entries)) {
      this.set(name, value);
    }
  }

  /**
   * Bind `name`, replacing any earlier binding
   */
  set(name: string, value: unknown): this {
    this.values.set(name, fromUnknown(value, name));
    return this;
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  lookup(name: string): JinjaValue | undefined {
    return this.values.get(name);
  }

  names(): string[] {
    return [...this.values.keys()];
  }
}
