import { describe, expect, it } from 'vitest';
import { PipevarsErrorCode } from '../errors/ErrorCodes.js';
import { VariableSource } from '../types/core-types.js';
import { CandidateTable } from './CandidateTable.js';
import { CoalescingMerger, coalesce } from './CoalescingMerger.js';

function staticTable(lines: Array<[string, string]>): CandidateTable {
  const table = new CandidateTable();
  for (const [name, value] of lines) {
    table.addUser(name, value, VariableSource.STATIC);
  }
  return table;
}

describe('CoalescingMerger', () => {
  it('keeps the first non-empty value of a repeated name', () => {
    const { resultSet } = CoalescingMerger.merge(staticTable([['name', 'a'], ['name', '']]));
    expect(resultSet.get('name')?.value).toBe('a');
  });

  it('prefers the canonical name over its default_ alias', () => {
    const { resultSet } = CoalescingMerger.merge(staticTable([['username', 'alice'], ['default_username', 'guest']]));
    expect(resultSet.get('username')?.value).toBe('alice');
    expect(resultSet.get('username')?.source).toBe(VariableSource.STATIC);
    expect(resultSet.get('default_username')?.value).toBe('guest');
  });

  it('falls back to the alias when the canonical value is empty', () => {
    const { resultSet } = CoalescingMerger.merge(staticTable([['username', ''], ['default_username', 'guest']]));
    expect(resultSet.get('username')?.value).toBe('guest');
    expect(resultSet.get('username')?.source).toBe(VariableSource.ALIAS);
  });

  it('ranks families regardless of the order they were added in', () => {
    const table = new CandidateTable();
    table.addUser('team', 'from-expression', VariableSource.EXPRESSION);
    table.addUser('team', 'from-static', VariableSource.STATIC);
    const { resultSet } = CoalescingMerger.merge(table);
    expect(resultSet.get('team')?.value).toBe('from-static');
    expect(resultSet.get('team')?.candidates.map(candidate => candidate.value)).toEqual(['from-static', 'from-expression']);
  });

  it('treats false and 0 as values', () => {
    expect(coalesce([
      { value: false, source: VariableSource.EXPRESSION, declaredAs: 'flag' },
      { value: 'yes', source: VariableSource.STATIC, declaredAs: 'flag' },
    ]).value).toBe(false);
    expect(coalesce([{ value: 0, source: VariableSource.EXPRESSION, declaredAs: 'n' }]).value).toBe(0);
  });

  it('distinguishes an empty string from no value when everything is empty', () => {
    expect(coalesce([
      { value: null, source: VariableSource.EXPRESSION, declaredAs: 'x' },
      { value: '', source: VariableSource.STATIC, declaredAs: 'x' },
    ])).toEqual({ value: '', winner: null });
    expect(coalesce([{ value: null, source: VariableSource.EXPRESSION, declaredAs: 'x' }]).value).toBeNull();
  });

  it('reports user values that override standard values', () => {
    const table = new CandidateTable();
    table.addStandard('resolved-git-branch', 'main');
    table.addUser('resolved-git-branch', 'release', VariableSource.STATIC);

    const { resultSet, diagnostics } = CoalescingMerger.merge(table);

    expect(resultSet.get('resolved-git-branch')?.value).toBe('release');
    expect([...resultSet.keys()]).toEqual(['resolved-git-branch']);
    expect(diagnostics.map(diagnostic => diagnostic.code)).toEqual([PipevarsErrorCode.OUTPUT_STANDARD_OVERRIDE]);
  });

  it('does not report an override of a null standard value', () => {
    const table = new CandidateTable();
    table.addStandard('pr-number', null);
    table.addUser('pr-number', '7', VariableSource.STATIC);
    expect(CoalescingMerger.merge(table).diagnostics).toEqual([]);
  });

  it('orders user names before standard names', () => {
    const table = new CandidateTable();
    table.addStandard('event-name', 'push');
    table.addUser('b', '1', VariableSource.STATIC);
    table.addUser('a', '2', VariableSource.EXPRESSION);
    expect([...CoalescingMerger.merge(table).resultSet.keys()]).toEqual(['b', 'a', 'event-name']);
  });

  it('replaces fixed entries in place and appends new ones', () => {
    const table = staticTable([['var1', 'user'], ['other', 'x']]);
    const fixed = [
      { name: 'var1', value: 'expr', source: VariableSource.EXPRESSION, candidates: [] },
      { name: 'var2', value: null, source: VariableSource.EXPRESSION, candidates: [] },
    ];
    const { resultSet } = CoalescingMerger.merge(table, fixed);
    expect([...resultSet.keys()]).toEqual(['var1', 'other', 'var2']);
    expect(resultSet.get('var1')?.value).toBe('expr');
  });
});
