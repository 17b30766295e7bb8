import { describe, expect, it } from 'vitest';
import { VariableSource, type ResolvedVariable, type ScalarValue } from '../types/core-types.js';
import { OutputProjector } from './OutputProjector.js';
import { decodeResultSet, decodeScalar, encodeScalar } from './ValueCodec.js';

function resultSet(entries: Array<[string, ScalarValue]>): Map<string, ResolvedVariable> {
  return new Map(entries.map(([name, value]): [string, ResolvedVariable] => [
    name,
    { name, value, source: VariableSource.STATIC, candidates: [] },
  ]));
}

const none = { userNames: new Set<string>(), suppliedExpressions: new Set<string>() };

describe('ValueCodec', () => {
  it('writes canonical text', () => {
    expect(encodeScalar(true)).toBe('true');
    expect(encodeScalar(false)).toBe('false');
    expect(encodeScalar(null)).toBe('');
    expect(encodeScalar(3.5)).toBe('3.5');
    expect(encodeScalar('text')).toBe('text');
  });

  it('reads canonical text back', () => {
    expect(decodeScalar('true')).toBe(true);
    expect(decodeScalar('false')).toBe(false);
    expect(decodeScalar('')).toBeNull();
    expect(decodeScalar('42')).toBe('42');
  });
});

describe('OutputProjector', () => {
  it('emits the JSON blob under both all and custom', () => {
    const projection = OutputProjector.project(resultSet([['a', 'x'], ['b', true], ['c', null]]), none);
    expect(projection.json).toBe('{"a":"x","b":true,"c":null}');
    expect(projection.outputs.get('all')).toBe(projection.json);
    expect(projection.outputs.get('custom')).toBe(projection.json);
  });

  it('keeps types through the JSON blob', () => {
    const projection = OutputProjector.project(resultSet([['flag', false], ['empty', null], ['n', 7], ['s', 'x']]), none);
    expect(decodeResultSet(projection.json)).toEqual(new Map<string, ScalarValue>([
      ['flag', false],
      ['empty', null],
      ['n', 7],
      ['s', 'x'],
    ]));
  });

  it('emits one output per name in canonical text', () => {
    const projection = OutputProjector.project(resultSet([['flag', false], ['empty', null]]), none);
    expect(projection.outputs.get('flag')).toBe('false');
    expect(projection.outputs.get('empty')).toBe('');
  });

  it('always emits var1 to var3', () => {
    const projection = OutputProjector.project(resultSet([['var2', 'two']]), none);
    expect(projection.outputs.get('var1')).toBe('');
    expect(projection.outputs.get('var2')).toBe('two');
    expect(projection.outputs.get('var3')).toBe('');
  });

  it('reports user names shadowed by reserved outputs', () => {
    const projection = OutputProjector.project(resultSet([['all', 'mine'], ['keep', 'k']]), {
      userNames: new Set(['all', 'keep']),
      suppliedExpressions: new Set<string>(),
    });
    expect(projection.shadowed).toEqual(['all']);
    expect(projection.outputs.get('all')).toBe('{"all":"mine","keep":"k"}');
    expect(projection.diagnostics[0]?.message).toBe('Variable "all" is shadowed by the reserved output of the same name');
  });

  it('only shadows a user varN when the expression input was given', () => {
    const rs = resultSet([['var1', 'from-user']]);
    const options = { userNames: new Set(['var1']), suppliedExpressions: new Set<string>() };
    expect(OutputProjector.project(rs, options).shadowed).toEqual([]);
    expect(OutputProjector.project(rs, { ...options, suppliedExpressions: new Set(['var1']) }).shadowed).toEqual(['var1']);
  });
});
