import { align, type Alignment } from './alignment.js';
import type { ScoringOptions } from './options.js';
import type { StructuredUnit } from './types.js';
import { ngramJaccard } from '../utils/textSimilarity.js';

/**
 * Unit Aligner
 *
 * Greedy one-to-one pairing of predicted and gold units by unit_text
 * character-bigram overlap. Span-invalid predicted units stay unmatched
 * and count as false positives.
 */
export class UnitAligner {
  constructor(private options: Pick<ScoringOptions, 'unitOverlapThreshold' | 'ngramSize'>) {}

  align(predicted: readonly StructuredUnit[], gold: readonly StructuredUnit[]): Alignment {
    // a unit whose text is not in the provision never aligns
    const weights = predicted.map((p) =>
      gold.map((g) => (p.span_invalid ? 0 : ngramJaccard(p.unit_text, g.unit_text, this.options.ngramSize)))
    );
    return align(weights, predicted.length, gold.length, {
      strategy: 'greedy',
      minScore: this.options.unitOverlapThreshold,
    });
  }
}
