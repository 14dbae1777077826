import { align } from './alignment.js';
import { DEFAULT_SCORING_OPTIONS, type ScoringOptions } from './options.js';
import { collectLeaves, isSubtree, type ConditionLeaf, type ConditionNode, type Effect } from './types.js';
import { textSimilarity } from '../utils/textSimilarity.js';

/**
 * Tree Comparator
 *
 * Recursive similarity between two condition trees. Children are paired
 * by maximum-weight assignment at every level; a leaf never pairs with a
 * subtree.
 */

export interface LeafPair {
  predicted: ConditionLeaf;
  gold: ConditionLeaf;
  score: number;
}

export interface TreeComparison {
  /** In [0, 1] */
  score: number;
  matchedLeaves: LeafPair[];
  /** Predicted leaves left without a gold counterpart */
  extraLeaves: ConditionLeaf[];
  /** Gold leaves left without a predicted counterpart */
  missingLeaves: ConditionLeaf[];
  /** AND/OR disagreements among paired subtrees */
  opMismatches: number;
}

/** Tag shared by every effect when effects are compared as a flat tree */
const EFFECT_TAG = '__effect__';

type ComparatorOptions = Pick<ScoringOptions, 'leafTextThreshold' | 'opMismatchPenalty'>;

export class TreeComparator {
  private options: ComparatorOptions;

  constructor(options: Partial<ComparatorOptions> = {}) {
    this.options = {
      leafTextThreshold: options.leafTextThreshold ?? DEFAULT_SCORING_OPTIONS.leafTextThreshold,
      opMismatchPenalty: options.opMismatchPenalty ?? DEFAULT_SCORING_OPTIONS.opMismatchPenalty,
    };
  }

  compare(predicted: ConditionNode, gold: ConditionNode): TreeComparison {
    if (!isSubtree(predicted) && !isSubtree(gold)) {
      const score = this.leafScore(predicted, gold);
      return score > 0
        ? { score, matchedLeaves: [{ predicted, gold, score }], extraLeaves: [], missingLeaves: [], opMismatches: 0 }
        : { score: 0, matchedLeaves: [], extraLeaves: [predicted], missingLeaves: [gold], opMismatches: 0 };
    }

    if (!isSubtree(predicted) || !isSubtree(gold)) {
      return {
        score: 0,
        matchedLeaves: [],
        extraLeaves: collectLeaves(predicted),
        missingLeaves: collectLeaves(gold),
        opMismatches: 0,
      };
    }

    const opMatches = predicted.op === gold.op;
    const penalty = opMatches ? 1 : this.options.opMismatchPenalty;

    const children = predicted.items.map((p) => gold.items.map((g) => this.compare(p, g)));
    const weights = children.map((row) => row.map((c) => c.score));
    const alignment = align(weights, predicted.items.length, gold.items.length, { strategy: 'exact' });

    const result: TreeComparison = {
      score: 0,
      matchedLeaves: [],
      extraLeaves: [],
      missingLeaves: [],
      opMismatches: opMatches ? 0 : 1,
    };

    let total = 0;
    for (const pair of alignment.pairs) {
      const child = children[pair.predicted][pair.gold];
      total += child.score;
      result.matchedLeaves.push(...child.matchedLeaves);
      result.extraLeaves.push(...child.extraLeaves);
      result.missingLeaves.push(...child.missingLeaves);
      result.opMismatches += child.opMismatches;
    }
    for (const index of alignment.unmatchedPredicted) {
      result.extraLeaves.push(...collectLeaves(predicted.items[index]));
    }
    for (const index of alignment.unmatchedGold) {
      result.missingLeaves.push(...collectLeaves(gold.items[index]));
    }

    const width = Math.max(predicted.items.length, gold.items.length);
    result.score = (width === 0 ? 1 : total / width) * penalty;
    return result;
  }

  /**
   * Effects are an unordered list, scored as a flat OR tree of leaves that
   * all share one tag.
   */
  compareEffects(predicted: readonly Effect[], gold: readonly Effect[]): TreeComparison {
    const asTree = (effects: readonly Effect[]): ConditionNode => ({
      op: 'OR',
      items: effects.map(
        (effect): ConditionLeaf => ({
          leaf_id: effect.effect_id,
          tag: EFFECT_TAG,
          text: effect.effect_text,
          ...(effect.span_invalid ? { span_invalid: true as const } : {}),
        })
      ),
    });
    return this.compare(asTree(predicted), asTree(gold));
  }

  /**
   * A predicted leaf whose span failed validation scores 0.
   */
  leafScore(predicted: ConditionLeaf, gold: ConditionLeaf): number {
    if (predicted.span_invalid) {
      return 0;
    }
    const tagMatch = predicted.tag === gold.tag ? 1 : 0;
    const similarity = textSimilarity(predicted.text, gold.text);
    if (tagMatch === 1 && similarity >= this.options.leafTextThreshold) {
      return 1;
    }
    return 0.5 * tagMatch + 0.5 * similarity;
  }
}
