import { align } from './alignment.js';
import type { ScoringOptions } from './options.js';
import type { TreeComparator, TreeComparison } from './TreeComparator.js';
import { isSubtree, type Branch } from './types.js';
import { jaccard, ngramJaccard } from '../utils/textSimilarity.js';

/**
 * Branch Aligner
 *
 * Pairs the branches of two aligned units. A cheap preliminary score
 * prunes hopeless pairs before the full tree comparison runs.
 */

export interface BranchPairScore {
  predicted: number;
  gold: number;
  similarity: number;
  normKindMatch: boolean;
  anchorSimilarity: number;
  conditions: TreeComparison;
  effects: TreeComparison;
}

export interface BranchAlignment {
  pairs: BranchPairScore[];
  unmatchedPredicted: number[];
  unmatchedGold: number[];
}

type BranchOptions = Pick<
  ScoringOptions,
  'branchPruneThreshold' | 'ngramSize' | 'branchPreliminaryWeights' | 'branchWeights'
>;

export class BranchAligner {
  constructor(
    private options: BranchOptions,
    private comparator: TreeComparator
  ) {}

  align(predicted: readonly Branch[], gold: readonly Branch[]): BranchAlignment {
    const scored: (BranchPairScore | null)[][] = predicted.map((p, i) =>
      gold.map((g, j) =>
        this.preliminaryScore(p, g) < this.options.branchPruneThreshold ? null : this.score(p, g, i, j)
      )
    );
    const weights = scored.map((row) => row.map((pair) => pair?.similarity ?? 0));
    const alignment = align(weights, predicted.length, gold.length, { strategy: 'exact' });

    const pairs: BranchPairScore[] = [];
    for (const pair of alignment.pairs) {
      const detail = scored[pair.predicted][pair.gold];
      if (detail) {
        pairs.push(detail);
      }
    }
    return {
      pairs,
      unmatchedPredicted: alignment.unmatchedPredicted,
      unmatchedGold: alignment.unmatchedGold,
    };
  }

  preliminaryScore(predicted: Branch, gold: Branch): number {
    const w = this.options.branchPreliminaryWeights;
    return (
      w.normKind * (predicted.norm_kind === gold.norm_kind ? 1 : 0) +
      w.anchor * this.anchorSimilarity(predicted, gold) +
      w.tagSet * jaccard(topLevelTags(predicted), topLevelTags(gold))
    );
  }

  private score(predicted: Branch, gold: Branch, i: number, j: number): BranchPairScore {
    const w = this.options.branchWeights;
    const normKindMatch = predicted.norm_kind === gold.norm_kind;
    const anchorSimilarity = this.anchorSimilarity(predicted, gold);
    const conditions = this.comparator.compare(predicted.conditions, gold.conditions);
    const effects = this.comparator.compareEffects(predicted.effects, gold.effects);

    return {
      predicted: i,
      gold: j,
      similarity:
        w.normKind * (normKindMatch ? 1 : 0) +
        w.anchor * anchorSimilarity +
        w.conditions * conditions.score +
        w.effects * effects.score,
      normKindMatch,
      anchorSimilarity,
      conditions,
      effects,
    };
  }

  private anchorSimilarity(predicted: Branch, gold: Branch): number {
    if (predicted.anchor.span_invalid) {
      return 0;
    }
    return ngramJaccard(predicted.anchor.text, gold.anchor.text, this.options.ngramSize);
  }
}

function topLevelTags(branch: Branch): Set<string> {
  const tags = new Set<string>();
  for (const item of branch.conditions.items) {
    if (!isSubtree(item)) {
      tags.add(item.tag);
    }
  }
  return tags;
}
