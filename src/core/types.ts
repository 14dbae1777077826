/**
 * SG-DT Type Definitions
 *
 * Wire shapes of the st2.v3 structured-unit schema plus the match and
 * repair records produced while scoring them.
 */

export const SCHEMA_VERSION = 'st2.v3';

export const NORM_KINDS = [
  'OBLIGATION',
  'PROHIBITION',
  'PERMISSION',
  'RIGHT',
  'LIABILITY',
  'SANCTION',
  'DEFINITION',
  'PROCEDURE',
  'OTHER',
] as const;

export type NormKind = (typeof NORM_KINDS)[number];

export const LEAF_TAGS = [
  '主体',
  '行为',
  '对象',
  '前置条件',
  '方式',
  '目的',
  '情节',
  '数额',
  '结果',
  '程序',
  '引用',
  '排除',
] as const;

export type LeafTag = (typeof LEAF_TAGS)[number];

/** Subject leaves may hold an inferred placeholder instead of a span */
export const SUBJECT_TAG: LeafTag = '主体';

/** Exclusion leaves, scored separately as defeaters */
export const DEFEATER_TAG: LeafTag = '排除';

export const COMPRESSED_PREFIX = 'compressed:';

export type ConditionOp = 'AND' | 'OR';

/**
 * Condition leaf
 *
 * `tag` keeps whatever string the annotation carried; tags outside
 * LEAF_TAGS are logged by the normalizer and simply never match.
 */
export interface ConditionLeaf {
  readonly leaf_id: string;
  readonly tag: string;
  readonly text: string;
  readonly span_invalid?: true;
}

export interface ConditionSubtree {
  readonly op: ConditionOp;
  readonly items: readonly ConditionNode[];
}

export type ConditionNode = ConditionLeaf | ConditionSubtree;

export interface Anchor {
  readonly text: string;
  readonly occurrence: number;
  readonly span_invalid?: true;
}

export interface Effect {
  readonly effect_id: string;
  readonly effect_text: string;
  readonly span_invalid?: true;
}

export interface Branch {
  readonly branch_id: string;
  readonly anchor: Anchor;
  readonly norm_kind: NormKind;
  /** Root is always a subtree */
  readonly conditions: ConditionSubtree;
  readonly effects: readonly Effect[];
  readonly depends_on_units: readonly string[];
  readonly depends_on_article_ref: readonly string[];
  readonly unresolved_reference: boolean;
  readonly notes: string;
}

export interface UnitMeta {
  readonly scope_policy?: string;
  readonly compressed_enum?: boolean;
  readonly unresolved_reference?: boolean;
  readonly notes?: string;
}

export interface StructuredUnit {
  readonly schema_version: string;
  readonly rule_id: string;
  readonly law_title: string;
  readonly article_number: string;
  readonly rule_text: string;
  readonly unit_id: string;
  readonly unit_text: string;
  readonly unit_reason: string;
  readonly branches: readonly Branch[];
  readonly meta: UnitMeta;
  /** Set by the span validator when unit_text is not found in the provision */
  readonly span_invalid?: true;
}

export function isSubtree(node: ConditionNode): node is ConditionSubtree {
  return 'op' in node;
}

export function isLeaf(node: ConditionNode): node is ConditionLeaf {
  return !('op' in node);
}

export function isNormKind(value: string): value is NormKind {
  return (NORM_KINDS as readonly string[]).includes(value);
}

export function isLeafTag(value: string): value is LeafTag {
  return (LEAF_TAGS as readonly string[]).includes(value);
}

export function isCompressedLeaf(leaf: ConditionLeaf): boolean {
  return leaf.text.startsWith(COMPRESSED_PREFIX);
}

/**
 * Collect leaves in depth-first pre-order
 */
export function collectLeaves(node: ConditionNode): ConditionLeaf[] {
  if (!isSubtree(node)) {
    return [node];
  }
  return node.items.flatMap((item) => collectLeaves(item));
}

/**
 * Depth of a condition tree (root counts as depth 1)
 */
export function treeDepth(node: ConditionNode): number {
  if (!isSubtree(node) || node.items.length === 0) {
    return 1;
  }
  return 1 + Math.max(...node.items.map((item) => treeDepth(item)));
}

/**
 * Bipartite pairing record
 *
 * A null on either side marks an unmatched (extra or missing) element.
 */
export interface MatchResult {
  readonly predicted_id: string | null;
  readonly gold_id: string | null;
  readonly score: number;
}

/**
 * Stable reason codes for every repair the normalizer may apply
 */
export type RepairCode =
  | 'drop_unknown_field'
  | 'drop_exceptions'
  | 'default_field'
  | 'coerce_norm_kind'
  | 'coerce_op'
  | 'unknown_leaf_tag'
  | 'drop_malformed_item'
  | 'wrap_root_leaf'
  | 'renumber_branch_ids'
  | 'renumber_leaf_ids'
  | 'renumber_effect_ids'
  | 'empty_conditions'
  | 'flatten_nested_op'
  | 'merge_duplicate_leaves'
  | 'compress_enum_run'
  | 'limits_exceeded'
  | 'unrepairable_unit';

export interface RepairEntry {
  readonly code: RepairCode;
  /** JSON-pointer-like location, e.g. `units[0].branches[1].conditions` */
  readonly path: string;
}
