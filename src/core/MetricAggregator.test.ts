import { describe, expect, it } from 'vitest';
import {
  computeRates,
  emptyCounts,
  foldCounts,
  headlineMetrics,
  mergeCounts,
  precisionRecall,
  type MetricCounts,
} from './MetricAggregator.js';

function sampleCounts(seed: number): MetricCounts {
  const counts = emptyCounts();
  counts.samples = 1;
  counts.parseOk = 1;
  counts.schemaOk = seed % 2;
  counts.units = { predicted: seed, gold: seed + 1, matched: seed };
  counts.branches = { predicted: seed + 2, gold: seed + 1, matched: seed, normKindCorrect: seed, similaritySum: seed * 0.5 };
  counts.leaves = { predicted: 3, gold: 4, matched: 3, tagCorrect: 2, exact: 1 };
  counts.leafTags = { [seed % 2 ? '主体' : '对象']: { predicted: 1, gold: 2, correct: 1 } };
  counts.spans.leaf = { checked: 4, invalid: seed % 3 };
  counts.softSpans = { predicted: seed + 1, gold: seed + 1, matched: seed };
  counts.treeEdit = { similaritySum: seed / 4, distanceSum: 1 - seed / 4 };
  counts.repairs = { total: seed, rejectedUnits: 0, byCode: { [`code_${seed}`]: seed } };
  return counts;
}

describe('precisionRecall', () => {
  it('treats an empty prediction against empty gold as perfect', () => {
    expect(precisionRecall(0, 0, 0)).toEqual({ precision: 1, recall: 1, f1: 1 });
  });

  it('gives zero precision to an empty prediction against non-empty gold', () => {
    expect(precisionRecall(0, 0, 5)).toEqual({ precision: 0, recall: 0, f1: 0 });
  });

  it('gives full recall when there is no gold', () => {
    expect(precisionRecall(0, 3, 0)).toEqual({ precision: 0, recall: 1, f1: 0 });
  });

  it('computes the harmonic mean', () => {
    const result = precisionRecall(2, 3, 2);
    expect(result.precision).toBeCloseTo(2 / 3);
    expect(result.recall).toBe(1);
    expect(result.f1).toBeCloseTo(0.8);
  });
});

describe('mergeCounts', () => {
  const a = sampleCounts(1);
  const b = sampleCounts(2);
  const c = sampleCounts(3);

  it('has emptyCounts as identity', () => {
    expect(mergeCounts(emptyCounts(), a)).toEqual(a);
    expect(mergeCounts(a, emptyCounts())).toEqual(a);
  });

  it('is commutative and associative', () => {
    expect(mergeCounts(a, b)).toEqual(mergeCounts(b, a));
    expect(mergeCounts(mergeCounts(a, b), c)).toEqual(mergeCounts(a, mergeCounts(b, c)));
  });

  it('folds to the same totals in any order', () => {
    const forward = foldCounts([a, b, c]);
    const shuffled = foldCounts([c, a, b]);
    expect(shuffled).toEqual(forward);
    expect(JSON.stringify(shuffled)).toBe(JSON.stringify(forward));
    expect(forward.samples).toBe(3);
    expect(forward.leafTags).toEqual({
      主体: { predicted: 2, gold: 4, correct: 2 },
      对象: { predicted: 1, gold: 2, correct: 1 },
    });
    expect(forward.repairs.byCode).toEqual({ code_1: 1, code_2: 2, code_3: 3 });
  });
});

describe('computeRates', () => {
  it('never divides by zero', () => {
    const rates = computeRates(emptyCounts());
    expect(rates.unit).toEqual({ precision: 1, recall: 1, f1: 1 });
    expect(rates.normKindAccuracy).toBe(1);
    expect(rates.spanFaithfulness).toBe(1);
    expect(rates.hallucinationRate).toBe(0);
    expect(rates.defeaterRecall).toBe(1);
    expect(rates.treeExactMatch).toBe(0);
    expect(rates.parseOkRate).toBe(0);
    expect(rates.softSpan).toEqual({ precision: 1, recall: 1, f1: 1 });
    expect(rates.treeEditSimilarity).toBe(1);
    expect(rates.normalizedEditDistance).toBe(0);
  });

  it('derives rates from pooled counts', () => {
    const counts = foldCounts([sampleCounts(1), sampleCounts(2)]);
    counts.missing = 0;
    const rates = computeRates(counts);

    // branches: predicted 3+4, gold 2+3, matched 1+2, similarity 0.5+1
    expect(rates.branch.precision).toBeCloseTo(3 / 7);
    expect(rates.branch.recall).toBeCloseTo(3 / 5);
    expect(rates.structural.recall).toBeCloseTo(1.5 / 5);
    expect(rates.normKindAccuracy).toBe(1);
    // 8 leaf spans checked, 1 + 2 invalid
    expect(rates.hallucinationRate).toBeCloseTo(3 / 8);
    expect(rates.spanFaithfulness).toBeCloseTo(5 / 8);
    expect(rates.schemaOkRate).toBe(0.5);
    expect(rates.leafTagByTag['对象']).toEqual(precisionRecall(1, 1, 2));
    // soft spans: 1+2 matched of 2+3 on each side
    expect(rates.softSpan.f1).toBeCloseTo(3 / 5);
    // per-sample TES 0.25 and 0.5 over two samples
    expect(rates.treeEditSimilarity).toBeCloseTo(0.375);
    expect(rates.normalizedEditDistance).toBeCloseTo(0.625);
  });

  it('excludes missing samples from parse rates', () => {
    const counts = emptyCounts();
    counts.samples = 4;
    counts.missing = 2;
    counts.parseOk = 1;
    expect(computeRates(counts).parseOkRate).toBe(0.5);
  });
});

describe('headlineMetrics', () => {
  it('exposes the flat headline keys', () => {
    expect(Object.keys(headlineMetrics(computeRates(emptyCounts())))).toEqual([
      'Unit-F1',
      'Branch-F1',
      'Structural-F1',
      'NormKind-Acc',
      'LeafTag-F1',
      'EffectExact-F1',
      'EffectOverlap-F1',
      'SpanFaith',
      'Halluc',
      'DefeaterRecall',
      'Tree-EM',
      'Edge-F1',
      'NodeSpan-F1',
      'SoftF1',
      'TES',
      'nTED',
      'ParseOK',
      'SchemaOK',
    ]);
  });
});
