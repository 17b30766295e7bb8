import { describe, expect, it } from 'vitest';
import { closestName, editDistance } from './TypoDetector.js';

describe('editDistance', () => {
  it('counts single-character edits', () => {
    expect(editDistance('kitten', 'sitting')).toBe(3);
    expect(editDistance('lowr', 'lower')).toBe(1);
    expect(editDistance('', 'abc')).toBe(3);
    expect(editDistance('same', 'same')).toBe(0);
  });
});

describe('closestName', () => {
  it('picks the nearest known name', () => {
    expect(closestName('lenght', ['lower', 'length', 'last'])).toBe('length');
  });

  it('ignores case', () => {
    expect(closestName('UPPR', ['lower', 'upper'])).toBe('upper');
  });

  it('offers nothing for names too far away', () => {
    expect(closestName('xyz', ['lower', 'upper'])).toBeUndefined();
  });

  it('prefers the earlier name on a tie', () => {
    expect(closestName('bat', ['cat', 'hat'])).toBe('cat');
  });
});
