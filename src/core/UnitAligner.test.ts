import { describe, expect, it } from 'vitest';
import { DEFAULT_SCORING_OPTIONS } from './options.js';
import { UnitAligner } from './UnitAligner.js';
import { goldUnit, unit } from '../testing/fixtures.js';

const unionUnit = unit([], { unit_id: 'U2', unit_text: '劳动者有权依法参加和组织工会。' });

describe('UnitAligner', () => {
  const aligner = new UnitAligner(DEFAULT_SCORING_OPTIONS);

  it('pairs units by text regardless of order', () => {
    const result = aligner.align([unionUnit, goldUnit()], [goldUnit(), unionUnit]);
    expect(result.pairs).toEqual([
      { predicted: 1, gold: 0, score: 1 },
      { predicted: 0, gold: 1, score: 1 },
    ]);
  });

  it('leaves low-overlap units unmatched', () => {
    const result = aligner.align([unit([], { unit_text: '本法自公布之日起施行。' })], [goldUnit()]);
    expect(result.pairs).toEqual([]);
    expect(result.unmatchedPredicted).toEqual([0]);
    expect(result.unmatchedGold).toEqual([0]);
  });

  it('never pairs a unit flagged as outside the provision', () => {
    const result = aligner.align([{ ...goldUnit(), span_invalid: true }], [goldUnit()]);
    expect(result.pairs).toEqual([]);
    expect(result.unmatchedPredicted).toEqual([0]);
    expect(result.unmatchedGold).toEqual([0]);
  });

  it('respects a custom overlap threshold', () => {
    // 8 of 30 bigrams shared
    const shorter = unit([], { unit_text: '用人单位应当支付工资。' });
    const lenient = new UnitAligner({ ...DEFAULT_SCORING_OPTIONS, unitOverlapThreshold: 0.2 });
    expect(aligner.align([shorter], [goldUnit()]).pairs).toEqual([]);
    expect(lenient.align([shorter], [goldUnit()]).pairs.length).toBe(1);
  });
});
