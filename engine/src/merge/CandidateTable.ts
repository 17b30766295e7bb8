/**
 * Candidate Table
 *
 * Collects every candidate value per output name, grouped by family.
 * Precedence never depends on the order in which families are added:
 * candidates are always read back as static, expression, standard
 * context, then alias, with declaration order inside a family.
 *
 * A user name `default_<name>` is an output of its own and also an alias
 * candidate for `<name>`, provided `<name>` is declared by some family.
 *
 * @module merge
 */

import { VariableSource, type Candidate, type ScalarValue } from '../types/core-types.js';

export const ALIAS_PREFIX = 'default_';

const FAMILY_ORDER = [
  VariableSource.STATIC,
  VariableSource.EXPRESSION,
  VariableSource.STANDARD_CONTEXT,
] as const;

type Family = (typeof FAMILY_ORDER)[number];

export class CandidateTable {
  private readonly families = new Map<string, Record<Family, Candidate[]>>();
  private readonly userOrder: string[] = [];
  private readonly standardOrder: string[] = [];

  /**
   * Add a static or expression candidate declared by the user
   */
  addUser(name: string, value: ScalarValue, source: VariableSource.STATIC | VariableSource.EXPRESSION): void {
    if (!this.userOrder.includes(name)) {
      this.userOrder.push(name);
    }
    this.slot(name)[source].push({ value, source, declaredAs: name });
  }

  addStandard(name: string, value: ScalarValue): void {
    if (!this.standardOrder.includes(name)) {
      this.standardOrder.push(name);
    }
    this.slot(name)[VariableSource.STANDARD_CONTEXT].push({
      value,
      source: VariableSource.STANDARD_CONTEXT,
      declaredAs: name,
    });
  }

  has(name: string): boolean {
    return this.families.has(name);
  }

  isStandard(name: string): boolean {
    return this.standardOrder.includes(name);
  }

  /**
   * Output names: user names in first-declaration order, then standard
   * names not declared by the user
   */
  names(): string[] {
    return [...this.userOrder, ...this.standardOnlyNames()];
  }

  userNames(): string[] {
    return [...this.userOrder];
  }

  standardOnlyNames(): string[] {
    return this.standardOrder.filter(name => !this.userOrder.includes(name));
  }

  /**
   * Candidates of `name` in precedence order, alias candidates last
   */
  candidates(name: string): Candidate[] {
    const own = this.families.get(name);
    if (!own) {
      return [];
    }

    const result: Candidate[] = FAMILY_ORDER.flatMap(family => own[family]);

    const alias = this.families.get(`${ALIAS_PREFIX}${name}`);
    if (alias) {
      for (const family of [VariableSource.STATIC, VariableSource.EXPRESSION] as const) {
        for (const candidate of alias[family]) {
          result.push({ ...candidate, source: VariableSource.ALIAS });
        }
      }
    }

    return result;
  }

  private slot(name: string): Record<Family, Candidate[]> {
    let slot = this.families.get(name);
    if (!slot) {
      slot = {
        [VariableSource.STATIC]: [],
        [VariableSource.EXPRESSION]: [],
        [VariableSource.STANDARD_CONTEXT]: [],
      };
      this.families.set(name, slot);
    }
    return slot;
  }
}
