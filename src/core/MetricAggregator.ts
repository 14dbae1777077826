import { emptySpanStats, mergeSpanStats, type SpanStats } from './SpanValidator.js';

/**
 * Metric Aggregator
 *
 * Everything is kept as raw counts; rates are derived on demand. Counts
 * form a commutative monoid under `mergeCounts` with `emptyCounts()` as
 * identity, so per-sample results can be folded in any order.
 */

export interface PairCounts {
  predicted: number;
  gold: number;
  matched: number;
}

export interface TagCounts {
  predicted: number;
  gold: number;
  /** Matched leaf pairs whose tags agree */
  correct: number;
}

export interface MetricCounts {
  samples: number;
  /** Prediction text parsed as JSON */
  parseOk: number;
  /** Parsed and needed no repair */
  schemaOk: number;
  unparseable: number;
  missing: number;
  /** Samples that needed at least one repair */
  repairedSamples: number;
  /** Prediction identical to gold after alignment */
  exactMatch: number;

  units: PairCounts;
  branches: PairCounts & {
    normKindCorrect: number;
    /** Sum of similarities over matched branches */
    similaritySum: number;
  };
  leaves: PairCounts & {
    tagCorrect: number;
    /** Matched pairs that scored a full 1 */
    exact: number;
  };
  leafTags: Record<string, TagCounts>;
  effects: PairCounts & {
    exact: number;
    overlap: number;
  };
  defeaters: {
    gold: number;
    recalled: number;
    samplesWithGold: number;
  };
  opMismatches: number;
  spans: SpanStats;
  /** Labeled edges of the signature graphs */
  edges: PairCounts;
  /** Leaf and effect signatures */
  spanNodes: PairCounts;
  /** Located spans matched by IoU */
  softSpans: PairCounts;
  /** Per-sample TES and nTED, summed */
  treeEdit: {
    similaritySum: number;
    distanceSum: number;
  };
  repairs: {
    total: number;
    rejectedUnits: number;
    byCode: Record<string, number>;
  };
}

export interface PrecisionRecall {
  precision: number;
  recall: number;
  f1: number;
}

export interface MetricRates {
  unit: PrecisionRecall;
  branch: PrecisionRecall;
  structural: PrecisionRecall;
  normKindAccuracy: number;
  leafTag: PrecisionRecall;
  leafTagByTag: Record<string, PrecisionRecall>;
  effectExact: PrecisionRecall;
  effectOverlap: PrecisionRecall;
  spanFaithfulness: number;
  hallucinationRate: number;
  defeaterRecall: number;
  treeExactMatch: number;
  edge: PrecisionRecall;
  nodeSpan: PrecisionRecall;
  softSpan: PrecisionRecall;
  treeEditSimilarity: number;
  normalizedEditDistance: number;
  parseOkRate: number;
  schemaOkRate: number;
  repairRate: number;
}

/** Flat headline view written to metrics.json */
export type HeadlineMetrics = Record<string, number>;

export function emptyCounts(): MetricCounts {
  return {
    samples: 0,
    parseOk: 0,
    schemaOk: 0,
    unparseable: 0,
    missing: 0,
    repairedSamples: 0,
    exactMatch: 0,
    units: { predicted: 0, gold: 0, matched: 0 },
    branches: { predicted: 0, gold: 0, matched: 0, normKindCorrect: 0, similaritySum: 0 },
    leaves: { predicted: 0, gold: 0, matched: 0, tagCorrect: 0, exact: 0 },
    leafTags: {},
    effects: { predicted: 0, gold: 0, matched: 0, exact: 0, overlap: 0 },
    defeaters: { gold: 0, recalled: 0, samplesWithGold: 0 },
    opMismatches: 0,
    spans: emptySpanStats(),
    edges: { predicted: 0, gold: 0, matched: 0 },
    spanNodes: { predicted: 0, gold: 0, matched: 0 },
    softSpans: { predicted: 0, gold: 0, matched: 0 },
    treeEdit: { similaritySum: 0, distanceSum: 0 },
    repairs: { total: 0, rejectedUnits: 0, byCode: {} },
  };
}

function sumRecords<T>(
  a: Record<string, T>,
  b: Record<string, T>,
  add: (x: T, y: T) => T
): Record<string, T> {
  const result: Record<string, T> = { ...a };
  for (const [key, value] of Object.entries(b)) {
    const existing = result[key];
    result[key] = existing === undefined ? value : add(existing, value);
  }
  // key order must not depend on merge order
  return Object.fromEntries(Object.entries(result).sort(([x], [y]) => (x < y ? -1 : x > y ? 1 : 0)));
}

function addPairs(a: PairCounts, b: PairCounts): PairCounts {
  return {
    predicted: a.predicted + b.predicted,
    gold: a.gold + b.gold,
    matched: a.matched + b.matched,
  };
}

export function mergeCounts(a: MetricCounts, b: MetricCounts): MetricCounts {
  return {
    samples: a.samples + b.samples,
    parseOk: a.parseOk + b.parseOk,
    schemaOk: a.schemaOk + b.schemaOk,
    unparseable: a.unparseable + b.unparseable,
    missing: a.missing + b.missing,
    repairedSamples: a.repairedSamples + b.repairedSamples,
    exactMatch: a.exactMatch + b.exactMatch,
    units: addPairs(a.units, b.units),
    branches: {
      predicted: a.branches.predicted + b.branches.predicted,
      gold: a.branches.gold + b.branches.gold,
      matched: a.branches.matched + b.branches.matched,
      normKindCorrect: a.branches.normKindCorrect + b.branches.normKindCorrect,
      similaritySum: a.branches.similaritySum + b.branches.similaritySum,
    },
    leaves: {
      predicted: a.leaves.predicted + b.leaves.predicted,
      gold: a.leaves.gold + b.leaves.gold,
      matched: a.leaves.matched + b.leaves.matched,
      tagCorrect: a.leaves.tagCorrect + b.leaves.tagCorrect,
      exact: a.leaves.exact + b.leaves.exact,
    },
    leafTags: sumRecords(a.leafTags, b.leafTags, (x, y) => ({
      predicted: x.predicted + y.predicted,
      gold: x.gold + y.gold,
      correct: x.correct + y.correct,
    })),
    effects: {
      predicted: a.effects.predicted + b.effects.predicted,
      gold: a.effects.gold + b.effects.gold,
      matched: a.effects.matched + b.effects.matched,
      exact: a.effects.exact + b.effects.exact,
      overlap: a.effects.overlap + b.effects.overlap,
    },
    defeaters: {
      gold: a.defeaters.gold + b.defeaters.gold,
      recalled: a.defeaters.recalled + b.defeaters.recalled,
      samplesWithGold: a.defeaters.samplesWithGold + b.defeaters.samplesWithGold,
    },
    opMismatches: a.opMismatches + b.opMismatches,
    spans: mergeSpanStats(a.spans, b.spans),
    edges: addPairs(a.edges, b.edges),
    spanNodes: addPairs(a.spanNodes, b.spanNodes),
    softSpans: addPairs(a.softSpans, b.softSpans),
    treeEdit: {
      similaritySum: a.treeEdit.similaritySum + b.treeEdit.similaritySum,
      distanceSum: a.treeEdit.distanceSum + b.treeEdit.distanceSum,
    },
    repairs: {
      total: a.repairs.total + b.repairs.total,
      rejectedUnits: a.repairs.rejectedUnits + b.repairs.rejectedUnits,
      byCode: sumRecords(a.repairs.byCode, b.repairs.byCode, (x, y) => x + y),
    },
  };
}

export function foldCounts(counts: Iterable<MetricCounts>): MetricCounts {
  let total = emptyCounts();
  for (const c of counts) {
    total = mergeCounts(total, c);
  }
  return total;
}

function ratio(numerator: number, denominator: number, whenEmpty: number): number {
  return denominator === 0 ? whenEmpty : numerator / denominator;
}

/**
 * Precision over `predicted`, recall over `gold`. With nothing predicted,
 * precision is 1 only if gold is empty too; recall with no gold is 1.
 */
export function precisionRecall(truePositives: number, predicted: number, gold: number): PrecisionRecall {
  const precision = ratio(truePositives, predicted, gold === 0 ? 1 : 0);
  const recall = ratio(truePositives, gold, 1);
  const f1 = precision + recall === 0 ? 0 : (2 * precision * recall) / (precision + recall);
  return { precision, recall, f1 };
}

export function computeRates(c: MetricCounts): MetricRates {
  const spanChecked = c.spans.unit.checked + c.spans.anchor.checked + c.spans.leaf.checked + c.spans.effect.checked;
  const spanInvalid = c.spans.unit.invalid + c.spans.anchor.invalid + c.spans.leaf.invalid + c.spans.effect.invalid;

  const leafTagByTag: Record<string, PrecisionRecall> = {};
  for (const [tag, counts] of Object.entries(c.leafTags)) {
    leafTagByTag[tag] = precisionRecall(counts.correct, counts.predicted, counts.gold);
  }

  return {
    unit: precisionRecall(c.units.matched, c.units.predicted, c.units.gold),
    branch: precisionRecall(c.branches.matched, c.branches.predicted, c.branches.gold),
    structural: precisionRecall(c.branches.similaritySum, c.branches.predicted, c.branches.gold),
    normKindAccuracy: ratio(c.branches.normKindCorrect, c.branches.matched, c.branches.gold === 0 ? 1 : 0),
    leafTag: precisionRecall(c.leaves.tagCorrect, c.leaves.predicted, c.leaves.gold),
    leafTagByTag,
    effectExact: precisionRecall(c.effects.exact, c.effects.predicted, c.effects.gold),
    effectOverlap: precisionRecall(c.effects.overlap, c.effects.predicted, c.effects.gold),
    spanFaithfulness: ratio(spanChecked - spanInvalid, spanChecked, 1),
    hallucinationRate: ratio(spanInvalid, spanChecked, 0),
    defeaterRecall: ratio(c.defeaters.recalled, c.defeaters.gold, 1),
    treeExactMatch: ratio(c.exactMatch, c.samples, 0),
    edge: precisionRecall(c.edges.matched, c.edges.predicted, c.edges.gold),
    nodeSpan: precisionRecall(c.spanNodes.matched, c.spanNodes.predicted, c.spanNodes.gold),
    softSpan: precisionRecall(c.softSpans.matched, c.softSpans.predicted, c.softSpans.gold),
    treeEditSimilarity: ratio(c.treeEdit.similaritySum, c.samples, 1),
    normalizedEditDistance: ratio(c.treeEdit.distanceSum, c.samples, 0),
    parseOkRate: ratio(c.parseOk, c.samples - c.missing, 0),
    schemaOkRate: ratio(c.schemaOk, c.samples - c.missing, 0),
    repairRate: ratio(c.repairedSamples, c.samples - c.missing, 0),
  };
}

export function headlineMetrics(rates: MetricRates): HeadlineMetrics {
  return {
    'Unit-F1': rates.unit.f1,
    'Branch-F1': rates.branch.f1,
    'Structural-F1': rates.structural.f1,
    'NormKind-Acc': rates.normKindAccuracy,
    'LeafTag-F1': rates.leafTag.f1,
    'EffectExact-F1': rates.effectExact.f1,
    'EffectOverlap-F1': rates.effectOverlap.f1,
    SpanFaith: rates.spanFaithfulness,
    Halluc: rates.hallucinationRate,
    DefeaterRecall: rates.defeaterRecall,
    'Tree-EM': rates.treeExactMatch,
    'Edge-F1': rates.edge.f1,
    'NodeSpan-F1': rates.nodeSpan.f1,
    SoftF1: rates.softSpan.f1,
    TES: rates.treeEditSimilarity,
    nTED: rates.normalizedEditDistance,
    ParseOK: rates.parseOkRate,
    SchemaOK: rates.schemaOkRate,
  };
}
