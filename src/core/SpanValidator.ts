import { containsSpan } from '../utils/textSimilarity.js';
import {
  SUBJECT_TAG,
  isCompressedLeaf,
  isSubtree,
  type ConditionNode,
  type StructuredUnit,
} from './types.js';

/**
 * Span Validator
 *
 * Checks that declared spans occur verbatim (modulo whitespace) in the
 * governing unit_text, or in the provision text for spans inlined from
 * elsewhere in the provision. Offending elements are flagged, never removed.
 */

export interface SpanKindStats {
  checked: number;
  invalid: number;
}

export interface SpanStats {
  unit: SpanKindStats;
  anchor: SpanKindStats;
  leaf: SpanKindStats;
  effect: SpanKindStats;
}

export interface SpanValidationResult {
  unit: StructuredUnit;
  stats: SpanStats;
  /** Ids of flagged elements, `unit_id/element_id` */
  violations: string[];
}

export function emptySpanStats(): SpanStats {
  return {
    unit: { checked: 0, invalid: 0 },
    anchor: { checked: 0, invalid: 0 },
    leaf: { checked: 0, invalid: 0 },
    effect: { checked: 0, invalid: 0 },
  };
}

export function validateSpans(unit: StructuredUnit, provisionText: string): SpanValidationResult {
  const stats = emptySpanStats();
  const violations: string[] = [];

  const check = (kind: keyof SpanStats, text: string, id: string): boolean => {
    stats[kind].checked++;
    const valid = containsSpan(unit.unit_text, text) || containsSpan(provisionText, text);
    if (!valid) {
      stats[kind].invalid++;
      violations.push(`${unit.unit_id}/${id}`);
    }
    return valid;
  };

  const validateNode = (node: ConditionNode): ConditionNode => {
    if (isSubtree(node)) {
      return { op: node.op, items: node.items.map(validateNode) };
    }
    // subject placeholders and synthetic enumeration leaves carry no span
    if (node.tag === SUBJECT_TAG || isCompressedLeaf(node)) {
      return node;
    }
    return check('leaf', node.text, node.leaf_id) ? node : { ...node, span_invalid: true };
  };

  const branches = unit.branches.map((branch) => {
    const anchorValid = check('anchor', branch.anchor.text, `${branch.branch_id}.anchor`);
    return {
      ...branch,
      anchor: anchorValid ? branch.anchor : { ...branch.anchor, span_invalid: true as const },
      conditions: {
        op: branch.conditions.op,
        items: branch.conditions.items.map(validateNode),
      },
      effects: branch.effects.map((effect) =>
        check('effect', effect.effect_text, effect.effect_id)
          ? effect
          : { ...effect, span_invalid: true as const }
      ),
    };
  });

  stats.unit.checked++;
  const unitValid = provisionText.trim() === '' || containsSpan(provisionText, unit.unit_text);
  if (!unitValid) {
    stats.unit.invalid++;
    violations.push(unit.unit_id);
  }

  return {
    unit: unitValid ? { ...unit, branches } : { ...unit, branches, span_invalid: true },
    stats,
    violations,
  };
}

export function mergeSpanStats(a: SpanStats, b: SpanStats): SpanStats {
  const sum = (x: SpanKindStats, y: SpanKindStats): SpanKindStats => ({
    checked: x.checked + y.checked,
    invalid: x.invalid + y.invalid,
  });
  return {
    unit: sum(a.unit, b.unit),
    anchor: sum(a.anchor, b.anchor),
    leaf: sum(a.leaf, b.leaf),
    effect: sum(a.effect, b.effect),
  };
}
