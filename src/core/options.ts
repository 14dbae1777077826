/**
 * Scoring parameters
 *
 * Thresholds and weights are tunable; the defaults reproduce gold-vs-gold
 * identity and are overridable through EvaluationConfig.
 */
export interface ScoringOptions {
  /** Minimum unit_text bigram overlap for two units to align */
  unitOverlapThreshold: number;
  /** Leaf text similarity at which a same-tag leaf counts as a full match */
  leafTextThreshold: number;
  /** Multiplier applied when two subtrees disagree on AND/OR */
  opMismatchPenalty: number;
  /** Preliminary branch score below which a pair is not considered */
  branchPruneThreshold: number;
  /** Span IoU at which two located spans of the same type count as one */
  iouThreshold: number;
  /** Character n-gram size for unit and anchor overlap */
  ngramSize: number;
  branchPreliminaryWeights: {
    normKind: number;
    anchor: number;
    tagSet: number;
  };
  branchWeights: {
    normKind: number;
    anchor: number;
    conditions: number;
    effects: number;
  };
  /** Score samples that needed any repair as unparseable */
  strictSchema: boolean;
}

export const DEFAULT_SCORING_OPTIONS: ScoringOptions = {
  unitOverlapThreshold: 0.5,
  leafTextThreshold: 0.8,
  opMismatchPenalty: 0.5,
  branchPruneThreshold: 0.2,
  iouThreshold: 0.8,
  ngramSize: 2,
  branchPreliminaryWeights: {
    normKind: 0.4,
    anchor: 0.3,
    tagSet: 0.3,
  },
  branchWeights: {
    normKind: 0.3,
    anchor: 0.2,
    conditions: 0.3,
    effects: 0.2,
  },
  strictSchema: false,
};

export function resolveScoringOptions(overrides: Partial<ScoringOptions> = {}): ScoringOptions {
  return {
    ...DEFAULT_SCORING_OPTIONS,
    ...overrides,
    branchPreliminaryWeights: {
      ...DEFAULT_SCORING_OPTIONS.branchPreliminaryWeights,
      ...overrides.branchPreliminaryWeights,
    },
    branchWeights: {
      ...DEFAULT_SCORING_OPTIONS.branchWeights,
      ...overrides.branchWeights,
    },
  };
}
