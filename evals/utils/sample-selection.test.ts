import { describe, expect, it } from 'vitest';
import { normalizeRuleId, selectFraction } from './sample-selection.js';

const ids = Array.from({ length: 10 }, (_, i) => `item-${i}`);

describe('normalizeRuleId', () => {
  it('strips whitespace and trailing separators', () => {
    expect(normalizeRuleId(' R1 || ')).toBe('R1');
    expect(normalizeRuleId('R|1')).toBe('R|1');
  });
});

describe('selectFraction', () => {
  it('keeps n * frac items, rounding ties to even', () => {
    expect(selectFraction(ids, 0.3, '0', (id) => id).length).toBe(3);
    expect(selectFraction(ids, 0.25, '0', (id) => id).length).toBe(2);
    expect(selectFraction(ids, 0.35, '0', (id) => id).length).toBe(4);
    expect(selectFraction(ids, 0.05, '0', (id) => id)).toEqual([]);
  });

  it('is deterministic for a seed', () => {
    const first = selectFraction(ids, 0.5, '7', (id) => id);
    expect(selectFraction([...ids].reverse(), 0.5, '7', (id) => id)).toEqual(first);
  });

  it('selects a subset of a larger fraction with the same seed', () => {
    const small = selectFraction(ids, 0.2, 'seed', (id) => id);
    const large = selectFraction(ids, 0.6, 'seed', (id) => id);
    expect(large.slice(0, small.length)).toEqual(small);
  });

  it('handles the bounds', () => {
    expect(selectFraction(ids, 1, '0', (id) => id)).toEqual(ids);
    expect(selectFraction(ids, 0, '0', (id) => id)).toEqual([]);
    expect(selectFraction(ids, 0.01, '0', (id) => id)).toEqual([]);
    expect(selectFraction(ids, 0.15, '0', (id) => id).length).toBe(2);
  });
});
