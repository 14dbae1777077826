import { BranchAligner, type BranchPairScore } from './BranchAligner.js';
import { computeRates, emptyCounts, type MetricCounts, type MetricRates } from './MetricAggregator.js';
import { resolveScoringOptions, type ScoringOptions } from './options.js';
import { SchemaNormalizer } from './SchemaNormalizer.js';
import { mergeSpanStats, validateSpans } from './SpanValidator.js';
import { compareStructure } from './StructureMetrics.js';
import { TreeComparator } from './TreeComparator.js';
import { UnitAligner } from './UnitAligner.js';
import {
  DEFEATER_TAG,
  collectLeaves,
  type Branch,
  type ConditionLeaf,
  type Effect,
  type MatchResult,
  type RepairEntry,
  type StructuredUnit,
} from './types.js';
import { ngramJaccard, normalizeWhitespace } from '../utils/textSimilarity.js';
import { parsePredictionText } from '../utils/validators.js';

/**
 * Sample Evaluator
 *
 * Scores one provision: repair, span-check, align units, branches and
 * condition trees, then count. Pure and synchronous; prediction problems
 * become a zero-credit score rather than an exception.
 */

export type PredictionInput =
  | { kind: 'missing' }
  | { kind: 'text'; text: string }
  | { kind: 'value'; value: unknown };

export interface SampleInput {
  ruleId: string;
  /** rule_text plus the full article text, for inlined spans */
  provisionText: string;
  gold: readonly StructuredUnit[];
  prediction: PredictionInput;
}

export type SampleStatus = 'ok' | 'unparseable' | 'missing';

export type UnparseableReason = 'invalid_json' | 'no_valid_units' | 'strict_schema';

export interface SampleScore {
  ruleId: string;
  status: SampleStatus;
  reason?: UnparseableReason;
  counts: MetricCounts;
  rates: MetricRates;
  unitMatches: MatchResult[];
  branchMatches: MatchResult[];
  leafMatches: MatchResult[];
  effectMatches: MatchResult[];
  repairs: RepairEntry[];
  spanViolations: string[];
}

export interface EvaluatedSample {
  score: SampleScore;
  /** Repaired prediction; null when nothing could be recovered */
  fixed: StructuredUnit[] | null;
}

/** Similarity at or above this counts as identical */
const IDENTICAL = 1 - 1e-9;

interface MatchBuffers {
  counts: MetricCounts;
  unitMatches: MatchResult[];
  branchMatches: MatchResult[];
  leafMatches: MatchResult[];
  effectMatches: MatchResult[];
  /** Cleared by any unmatched element or imperfect pair */
  exact: boolean;
}

export class SampleEvaluator {
  private options: ScoringOptions;
  private unitAligner: UnitAligner;
  private branchAligner: BranchAligner;

  constructor(
    options: Partial<ScoringOptions> = {},
    private normalizer: SchemaNormalizer = new SchemaNormalizer()
  ) {
    this.options = resolveScoringOptions(options);
    this.unitAligner = new UnitAligner(this.options);
    this.branchAligner = new BranchAligner(this.options, new TreeComparator(this.options));
  }

  evaluate(input: SampleInput): EvaluatedSample {
    const counts = emptyCounts();
    counts.samples = 1;

    let status: SampleStatus = 'ok';
    let reason: UnparseableReason | undefined;
    let repairs: RepairEntry[] = [];
    let fixed: StructuredUnit[] | null = null;
    let predicted: StructuredUnit[] = [];

    if (input.prediction.kind === 'missing') {
      status = 'missing';
      counts.missing = 1;
    } else {
      const value =
        input.prediction.kind === 'text' ? parsePredictionText(input.prediction.text) : input.prediction.value;

      if (value === null || value === undefined) {
        status = 'unparseable';
        reason = 'invalid_json';
      } else {
        counts.parseOk = 1;
        const normalized = this.normalizer.normalizeUnits(value);
        repairs = normalized.repairs;
        fixed = normalized.units;

        counts.repairs.total = repairs.length;
        counts.repairs.rejectedUnits = normalized.rejected;
        for (const repair of repairs) {
          counts.repairs.byCode[repair.code] = (counts.repairs.byCode[repair.code] ?? 0) + 1;
        }
        if (repairs.length > 0) {
          counts.repairedSamples = 1;
        }

        if (normalized.units === null) {
          status = 'unparseable';
          reason = 'no_valid_units';
        } else if (this.options.strictSchema && repairs.length > 0) {
          status = 'unparseable';
          reason = 'strict_schema';
        } else {
          if (repairs.length === 0) {
            counts.schemaOk = 1;
          }
          predicted = normalized.units;
        }
      }
    }

    if (status === 'unparseable') {
      counts.unparseable = 1;
    }

    const spanViolations: string[] = [];
    predicted = predicted.map((unit) => {
      const checked = validateSpans(unit, input.provisionText);
      counts.spans = mergeSpanStats(counts.spans, checked.stats);
      spanViolations.push(...checked.violations);
      return checked.unit;
    });

    const buffers: MatchBuffers = {
      counts,
      unitMatches: [],
      branchMatches: [],
      leafMatches: [],
      effectMatches: [],
      exact: status === 'ok',
    };
    this.scoreUnits(predicted, input.gold, buffers);
    if (buffers.exact) {
      counts.exactMatch = 1;
    }

    const structure = compareStructure(predicted, input.gold, spanSource(input), this.options.iouThreshold);
    counts.edges = structure.edges;
    counts.spanNodes = structure.spanNodes;
    counts.softSpans = structure.softSpans;
    // a prediction that could not be scored is as far from gold as possible
    counts.treeEdit =
      status === 'ok'
        ? { similaritySum: structure.treeEditSimilarity, distanceSum: structure.normalizedEditDistance }
        : { similaritySum: 0, distanceSum: 1 };

    return {
      score: {
        ruleId: input.ruleId,
        status,
        ...(reason ? { reason } : {}),
        counts,
        rates: computeRates(counts),
        unitMatches: buffers.unitMatches,
        branchMatches: buffers.branchMatches,
        leafMatches: buffers.leafMatches,
        effectMatches: buffers.effectMatches,
        repairs,
        spanViolations,
      },
      fixed,
    };
  }

  private scoreUnits(predicted: readonly StructuredUnit[], gold: readonly StructuredUnit[], out: MatchBuffers) {
    const { counts } = out;
    tally(predicted, 'predicted', counts);
    tally(gold, 'gold', counts);

    const alignment = this.unitAligner.align(predicted, gold);
    counts.units.matched = alignment.pairs.length;

    for (const pair of alignment.pairs) {
      const p = predicted[pair.predicted];
      const g = gold[pair.gold];
      out.unitMatches.push({ predicted_id: p.unit_id, gold_id: g.unit_id, score: pair.score });
      this.scoreBranches(p, g, out);
    }
    for (const index of alignment.unmatchedPredicted) {
      const unit = predicted[index];
      out.unitMatches.push({ predicted_id: unit.unit_id, gold_id: null, score: 0 });
      out.exact = false;
      unit.branches.forEach((branch) => unmatchedBranch(unit.unit_id, branch, 'predicted', out));
    }
    for (const index of alignment.unmatchedGold) {
      const unit = gold[index];
      out.unitMatches.push({ predicted_id: null, gold_id: unit.unit_id, score: 0 });
      out.exact = false;
      unit.branches.forEach((branch) => unmatchedBranch(unit.unit_id, branch, 'gold', out));
    }
  }

  private scoreBranches(predicted: StructuredUnit, gold: StructuredUnit, out: MatchBuffers) {
    const alignment = this.branchAligner.align(predicted.branches, gold.branches);

    for (const pair of alignment.pairs) {
      matchedBranch(predicted, gold, pair, out);
    }
    for (const index of alignment.unmatchedPredicted) {
      unmatchedBranch(predicted.unit_id, predicted.branches[index], 'predicted', out);
    }
    for (const index of alignment.unmatchedGold) {
      unmatchedBranch(gold.unit_id, gold.branches[index], 'gold', out);
    }
  }
}

/**
 * Text that spans are located in; gold unit texts when the provision
 * text is blank
 */
function spanSource(input: SampleInput): string {
  return input.provisionText.trim() ? input.provisionText : input.gold.map((unit) => unit.unit_text).join('\n');
}

/**
 * Element totals for one side, independent of alignment
 */
function tally(units: readonly StructuredUnit[], side: 'predicted' | 'gold', counts: MetricCounts) {
  counts.units[side] += units.length;
  for (const unit of units) {
    counts.branches[side] += unit.branches.length;
    for (const branch of unit.branches) {
      counts.effects[side] += branch.effects.length;
      for (const leaf of collectLeaves(branch.conditions)) {
        counts.leaves[side]++;
        tagCounts(counts, leaf.tag)[side]++;
        if (side === 'gold' && leaf.tag === DEFEATER_TAG) {
          counts.defeaters.gold++;
        }
      }
    }
  }
  if (side === 'gold' && counts.defeaters.gold > 0) {
    counts.defeaters.samplesWithGold = 1;
  }
}

function tagCounts(counts: MetricCounts, tag: string) {
  const existing = counts.leafTags[tag];
  if (existing) {
    return existing;
  }
  const created = { predicted: 0, gold: 0, correct: 0 };
  counts.leafTags[tag] = created;
  return created;
}

function matchedBranch(predicted: StructuredUnit, gold: StructuredUnit, pair: BranchPairScore, out: MatchBuffers) {
  const { counts } = out;
  const p = predicted.branches[pair.predicted];
  const g = gold.branches[pair.gold];

  out.branchMatches.push({
    predicted_id: `${predicted.unit_id}/${p.branch_id}`,
    gold_id: `${gold.unit_id}/${g.branch_id}`,
    score: pair.similarity,
  });
  counts.branches.matched++;
  counts.branches.similaritySum += pair.similarity;
  if (pair.normKindMatch) {
    counts.branches.normKindCorrect++;
  }
  counts.opMismatches += pair.conditions.opMismatches;
  if (pair.similarity < IDENTICAL) {
    out.exact = false;
  }

  for (const leaves of pair.conditions.matchedLeaves) {
    out.leafMatches.push({
      predicted_id: `${predicted.unit_id}/${leaves.predicted.leaf_id}`,
      gold_id: `${gold.unit_id}/${leaves.gold.leaf_id}`,
      score: leaves.score,
    });
    counts.leaves.matched++;
    if (leaves.predicted.tag === leaves.gold.tag) {
      counts.leaves.tagCorrect++;
      tagCounts(counts, leaves.gold.tag).correct++;
    }
    if (leaves.score === 1) {
      counts.leaves.exact++;
      if (leaves.gold.tag === DEFEATER_TAG) {
        counts.defeaters.recalled++;
      }
    }
  }
  unmatchedLeaves(predicted.unit_id, pair.conditions.extraLeaves, 'predicted', out);
  unmatchedLeaves(gold.unit_id, pair.conditions.missingLeaves, 'gold', out);

  for (const effects of pair.effects.matchedLeaves) {
    out.effectMatches.push({
      predicted_id: `${predicted.unit_id}/${effects.predicted.leaf_id}`,
      gold_id: `${gold.unit_id}/${effects.gold.leaf_id}`,
      score: effects.score,
    });
    counts.effects.matched++;
    if (normalizeWhitespace(effects.predicted.text) === normalizeWhitespace(effects.gold.text)) {
      counts.effects.exact++;
    }
    if (ngramJaccard(effects.predicted.text, effects.gold.text) > 0) {
      counts.effects.overlap++;
    }
  }
  for (const leaf of pair.effects.extraLeaves) {
    out.effectMatches.push({ predicted_id: `${predicted.unit_id}/${leaf.leaf_id}`, gold_id: null, score: 0 });
    out.exact = false;
  }
  for (const leaf of pair.effects.missingLeaves) {
    out.effectMatches.push({ predicted_id: null, gold_id: `${gold.unit_id}/${leaf.leaf_id}`, score: 0 });
    out.exact = false;
  }
}

function unmatchedBranch(unitId: string, branch: Branch, side: 'predicted' | 'gold', out: MatchBuffers) {
  const id = `${unitId}/${branch.branch_id}`;
  out.branchMatches.push(
    side === 'predicted' ? { predicted_id: id, gold_id: null, score: 0 } : { predicted_id: null, gold_id: id, score: 0 }
  );
  unmatchedLeaves(unitId, collectLeaves(branch.conditions), side, out);
  unmatchedEffects(unitId, branch.effects, side, out);
  out.exact = false;
}

function unmatchedLeaves(unitId: string, leaves: readonly ConditionLeaf[], side: 'predicted' | 'gold', out: MatchBuffers) {
  for (const leaf of leaves) {
    const id = `${unitId}/${leaf.leaf_id}`;
    out.leafMatches.push(
      side === 'predicted' ? { predicted_id: id, gold_id: null, score: 0 } : { predicted_id: null, gold_id: id, score: 0 }
    );
    out.exact = false;
  }
}

function unmatchedEffects(unitId: string, effects: readonly Effect[], side: 'predicted' | 'gold', out: MatchBuffers) {
  for (const effect of effects) {
    const id = `${unitId}/${effect.effect_id}`;
    out.effectMatches.push(
      side === 'predicted' ? { predicted_id: id, gold_id: null, score: 0 } : { predicted_id: null, gold_id: id, score: 0 }
    );
  }
}
