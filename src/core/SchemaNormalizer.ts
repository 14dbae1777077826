import {
  SCHEMA_VERSION,
  COMPRESSED_PREFIX,
  isLeafTag,
  isNormKind,
  isSubtree,
  treeDepth,
  type Anchor,
  type Branch,
  type ConditionLeaf,
  type ConditionNode,
  type ConditionOp,
  type ConditionSubtree,
  type Effect,
  type NormKind,
  type RepairCode,
  type RepairEntry,
  type StructuredUnit,
  type UnitMeta,
} from './types.js';

/**
 * Schema Normalizer
 *
 * The only constructor path for StructuredUnit values. Coerces an arbitrary
 * parsed JSON value into the st2.v3 shape and logs every repair with a
 * stable reason code. Repairs are limited to dropping, defaulting,
 * renumbering and the fixed collapse sequence; condition and effect content
 * is never invented.
 */

const TOP_KEYS = [
  'schema_version',
  'rule_id',
  'law_title',
  'article_number',
  'rule_text',
  'unit_id',
  'unit_text',
  'unit_reason',
  'branches',
  'meta',
] as const;

const BRANCH_KEYS = [
  'branch_id',
  'anchor',
  'norm_kind',
  'conditions',
  'effects',
  'depends_on_units',
  'depends_on_article_ref',
  'unresolved_reference',
  'notes',
] as const;

const META_KEYS = ['scope_policy', 'compressed_enum', 'unresolved_reference', 'notes'] as const;
const ANCHOR_KEYS = ['text', 'occurrence'] as const;
const LEAF_KEYS = ['leaf_id', 'tag', 'text'] as const;
const SUBTREE_KEYS = ['op', 'items'] as const;
const EFFECT_KEYS = ['effect_id', 'effect_text'] as const;

const EMPTY_CONDITIONS_NOTE = 'schema_fix:empty_conditions';

export interface NormalizerLimits {
  /** Maximum condition tree depth, root counting as 1 */
  maxDepth: number;
  /** Maximum number of items under one subtree */
  maxItems: number;
  /** Same-tag sibling runs at least this long are compressed */
  enumRunLength: number;
}

export const DEFAULT_NORMALIZER_LIMITS: NormalizerLimits = {
  maxDepth: 6,
  maxItems: 30,
  enumRunLength: 9,
};

export interface NormalizeResult {
  unit: StructuredUnit | null;
  repairs: RepairEntry[];
}

export interface NormalizeUnitsResult {
  /** null when the value is unparseable as a whole */
  units: StructuredUnit[] | null;
  repairs: RepairEntry[];
  rejected: number;
}

type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Mutable working copy of a branch while repairs are applied
 */
interface BranchDraft {
  branch_id: string;
  anchor: Anchor;
  norm_kind: NormKind;
  conditions: ConditionSubtree | null;
  effects: Effect[];
  depends_on_units: string[];
  depends_on_article_ref: string[];
  unresolved_reference: boolean;
  notes: string;
  compressed: boolean;
}

export class SchemaNormalizer {
  private limits: NormalizerLimits;

  constructor(limits: Partial<NormalizerLimits> = {}) {
    this.limits = { ...DEFAULT_NORMALIZER_LIMITS, ...limits };
  }

  /**
   * Normalize a provision-level prediction: one unit, a unit+structure
   * wrapper, or an array of either.
   */
  normalizeUnits(raw: unknown): NormalizeUnitsResult {
    if (isRecord(raw)) {
      const { unit, repairs } = this.normalizeUnit(raw, 'units[0]');
      return unit
        ? { units: [unit], repairs, rejected: 0 }
        : { units: null, repairs, rejected: 1 };
    }

    if (!Array.isArray(raw)) {
      return { units: null, repairs: [], rejected: 0 };
    }

    const units: StructuredUnit[] = [];
    const repairs: RepairEntry[] = [];
    let rejected = 0;

    raw.forEach((item, index) => {
      const result = this.normalizeUnit(item, `units[${index}]`);
      repairs.push(...result.repairs);
      if (result.unit) {
        units.push(result.unit);
      } else {
        rejected++;
      }
    });

    if (raw.length > 0 && units.length === 0) {
      return { units: null, repairs, rejected };
    }

    return { units, repairs, rejected };
  }

  /**
   * Normalize a single unit (or unit+structure wrapper)
   */
  normalizeUnit(raw: unknown, path = 'unit'): NormalizeResult {
    const repairs: RepairEntry[] = [];
    const log = (code: RepairCode, at: string) => repairs.push({ code, path: at });

    if (!isRecord(raw)) {
      log('unrepairable_unit', path);
      return { unit: null, repairs };
    }

    const source = unwrapStructure(raw);
    const unitId = nonEmptyString(source.unit_id);
    const ruleId = nonEmptyString(source.rule_id);
    if (unitId === null || ruleId === null) {
      log('unrepairable_unit', path);
      return { unit: null, repairs };
    }

    // (a) drop undeclared fields while reading the declared ones
    dropUnknownKeys(source, TOP_KEYS, path, log);

    const unitText = readString(source, 'unit_text', path, log, true);
    const meta = this.readMeta(source.meta, `${path}.meta`, log);

    let branches: BranchDraft[] = [];
    if (Array.isArray(source.branches)) {
      source.branches.forEach((rawBranch, index) => {
        const branch = this.readBranch(rawBranch, `${path}.branches[${index}]`, log);
        if (branch) {
          branches.push(branch);
        }
      });
    } else {
      log('default_field', `${path}.branches`);
    }

    // (b) deterministic ids in document order
    branches = renumber(branches, path, log);

    // (c) substitute empty conditions
    branches.forEach((branch, index) => {
      if (branch.conditions === null) {
        branch.conditions = { op: 'AND', items: [] };
        branch.unresolved_reference = false;
        branch.notes = branch.notes.trim()
          ? `${branch.notes}; ${EMPTY_CONDITIONS_NOTE}`
          : EMPTY_CONDITIONS_NOTE;
        log('empty_conditions', `${path}.branches[${index}].conditions`);
      }
    });

    // (d) flatten same-op nesting
    branches.forEach((branch, index) => {
      if (branch.conditions) {
        branch.conditions = flattenSameOp(branch.conditions, `${path}.branches[${index}].conditions`, log);
      }
    });

    // (e) collapse over-deep or over-wide trees
    branches.forEach((branch, index) => {
      if (branch.conditions) {
        const at = `${path}.branches[${index}].conditions`;
        const collapsed = this.collapse(branch.conditions, at, log);
        branch.conditions = collapsed.node;
        branch.compressed = collapsed.compressed;
      }
    });

    // ids are re-checked so collapse never leaves gaps
    branches = renumber(branches, path, log);

    const compressed = branches.some((b) => b.compressed) || meta.compressed_enum === true;

    const unit: StructuredUnit = {
      schema_version: readString(source, 'schema_version', path, log) || SCHEMA_VERSION,
      rule_id: ruleId,
      law_title: readString(source, 'law_title', path, log),
      article_number: readString(source, 'article_number', path, log),
      rule_text: readString(source, 'rule_text', path, log),
      unit_id: unitId,
      unit_text: unitText,
      unit_reason: readString(source, 'unit_reason', path, log),
      branches: branches.map(freezeBranch),
      meta: compressed ? { ...meta, compressed_enum: true } : meta,
    };

    return { unit, repairs };
  }

  private readMeta(raw: unknown, path: string, log: RepairLog): UnitMeta {
    if (raw === undefined) {
      return {};
    }
    if (!isRecord(raw)) {
      log('default_field', path);
      return {};
    }

    dropUnknownKeys(raw, META_KEYS, path, log);

    const meta: {
      scope_policy?: string;
      compressed_enum?: boolean;
      unresolved_reference?: boolean;
      notes?: string;
    } = {};

    for (const key of ['scope_policy', 'notes'] as const) {
      const value = raw[key];
      if (typeof value === 'string') {
        meta[key] = value;
      } else if (value !== undefined) {
        log('default_field', `${path}.${key}`);
      }
    }
    for (const key of ['compressed_enum', 'unresolved_reference'] as const) {
      const value = raw[key];
      if (typeof value === 'boolean') {
        meta[key] = value;
      } else if (value !== undefined) {
        log('default_field', `${path}.${key}`);
      }
    }

    return meta;
  }

  private readBranch(raw: unknown, path: string, log: RepairLog): BranchDraft | null {
    if (!isRecord(raw)) {
      log('drop_malformed_item', path);
      return null;
    }

    dropUnknownKeys(raw, BRANCH_KEYS, path, log);

    return {
      branch_id: typeof raw.branch_id === 'string' ? raw.branch_id : '',
      anchor: readAnchor(raw.anchor, `${path}.anchor`, log),
      norm_kind: readNormKind(raw.norm_kind, `${path}.norm_kind`, log),
      conditions: readRootConditions(raw.conditions, `${path}.conditions`, log),
      effects: readEffects(raw.effects, `${path}.effects`, log),
      depends_on_units: readStringList(raw.depends_on_units, `${path}.depends_on_units`, log),
      depends_on_article_ref: readStringList(
        raw.depends_on_article_ref,
        `${path}.depends_on_article_ref`,
        log
      ),
      unresolved_reference: readOptionalBoolean(
        raw.unresolved_reference,
        `${path}.unresolved_reference`,
        log
      ),
      notes: readOptionalString(raw.notes, `${path}.notes`, log),
      compressed: false,
    };
  }

  /**
   * Fixed collapse sequence: merge duplicate sibling leaves, then compress
   * long same-tag runs into one synthetic leaf.
   */
  private collapse(
    root: ConditionSubtree,
    path: string,
    log: RepairLog
  ): { node: ConditionSubtree; compressed: boolean } {
    if (!this.exceedsLimits(root)) {
      return { node: root, compressed: false };
    }

    const merged = mergeDuplicateLeaves(root, path, log);
    let compressed = false;
    const node = compressRuns(merged, this.limits.enumRunLength, path, () => {
      compressed = true;
      log('compress_enum_run', path);
    });

    if (treeDepth(node) > this.limits.maxDepth || maxWidth(node) > this.limits.maxItems) {
      log('limits_exceeded', path);
    }

    return { node, compressed };
  }

  private exceedsLimits(root: ConditionSubtree): boolean {
    return (
      treeDepth(root) > this.limits.maxDepth ||
      maxWidth(root) > this.limits.maxItems ||
      longestTagRun(root) >= this.limits.enumRunLength
    );
  }
}

type RepairLog = (code: RepairCode, path: string) => void;

function nonEmptyString(value: unknown): string | null {
  return typeof value === 'string' && value.trim() ? value : null;
}

/**
 * Unwrap `{unit_id, unit_text, unit_reason, structure}` pairs; wrapper
 * fields fill gaps in the inner structure.
 */
function unwrapStructure(raw: JsonRecord): JsonRecord {
  const inner = raw.structure;
  if (!isRecord(inner)) {
    return raw;
  }

  const merged: JsonRecord = { ...inner };
  for (const key of TOP_KEYS) {
    if (!(key in merged) && raw[key] !== undefined) {
      merged[key] = raw[key];
    }
  }
  return merged;
}

function dropUnknownKeys(
  raw: JsonRecord,
  allowed: readonly string[],
  path: string,
  log: RepairLog
): void {
  for (const key of Object.keys(raw)) {
    if (key === 'exceptions') {
      log('drop_exceptions', `${path}.${key}`);
    } else if (!allowed.includes(key)) {
      log('drop_unknown_field', `${path}.${key}`);
    }
  }
}

/**
 * Read a top-level string field. Absent provision fields default silently
 * unless `required`; present values of the wrong type are always logged.
 */
function readString(
  raw: JsonRecord,
  key: string,
  path: string,
  log: RepairLog,
  required = false
): string {
  const value = raw[key];
  if (typeof value === 'string') {
    return value;
  }
  if (value !== undefined || required) {
    log('default_field', `${path}.${key}`);
  }
  return '';
}

function readOptionalString(value: unknown, path: string, log: RepairLog): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value !== undefined) {
    log('default_field', path);
  }
  return '';
}

function readOptionalBoolean(value: unknown, path: string, log: RepairLog): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (value !== undefined) {
    log('default_field', path);
  }
  return false;
}

function readStringList(value: unknown, path: string, log: RepairLog): string[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    log('default_field', path);
    return [];
  }
  const strings = value.filter((v): v is string => typeof v === 'string');
  if (strings.length !== value.length) {
    log('default_field', path);
  }
  return strings;
}

function readAnchor(raw: unknown, path: string, log: RepairLog): Anchor {
  if (!isRecord(raw) || typeof raw.text !== 'string') {
    log('default_field', path);
    return { text: '', occurrence: 1 };
  }

  dropUnknownKeys(raw, ANCHOR_KEYS, path, log);

  const occurrence = raw.occurrence;
  if (occurrence === undefined) {
    return { text: raw.text, occurrence: 1 };
  }
  if (typeof occurrence !== 'number' || !Number.isInteger(occurrence) || occurrence < 1) {
    log('default_field', `${path}.occurrence`);
    return { text: raw.text, occurrence: 1 };
  }
  return { text: raw.text, occurrence };
}

function readNormKind(raw: unknown, path: string, log: RepairLog): NormKind {
  if (typeof raw === 'string' && isNormKind(raw)) {
    return raw;
  }

  log('coerce_norm_kind', path);
  if (typeof raw === 'string') {
    const upper = raw.trim().toUpperCase();
    if (isNormKind(upper)) {
      return upper;
    }
  }
  return 'OTHER';
}

function readOp(raw: unknown, path: string, log: RepairLog): ConditionOp | null {
  if (raw === 'AND' || raw === 'OR') {
    return raw;
  }
  if (typeof raw === 'string') {
    const upper = raw.trim().toUpperCase();
    if (upper === 'AND' || upper === 'OR') {
      log('coerce_op', path);
      return upper;
    }
  }
  return null;
}

function readRootConditions(raw: unknown, path: string, log: RepairLog): ConditionSubtree | null {
  if (!isRecord(raw)) {
    return null;
  }

  const node = readNode(raw, path, log);
  if (node === null) {
    return null;
  }
  if (!isSubtree(node)) {
    log('wrap_root_leaf', path);
    return { op: 'AND', items: [node] };
  }
  return node;
}

function readNode(raw: unknown, path: string, log: RepairLog): ConditionNode | null {
  if (!isRecord(raw)) {
    log('drop_malformed_item', path);
    return null;
  }

  if ('op' in raw || 'items' in raw) {
    const op = readOp(raw.op, `${path}.op`, log);
    if (op === null || !Array.isArray(raw.items)) {
      log('drop_malformed_item', path);
      return null;
    }
    dropUnknownKeys(raw, SUBTREE_KEYS, path, log);

    const items: ConditionNode[] = [];
    raw.items.forEach((item, index) => {
      const child = readNode(item, `${path}.items[${index}]`, log);
      if (child) {
        items.push(child);
      }
    });
    return { op, items };
  }

  if (typeof raw.tag !== 'string' || typeof raw.text !== 'string') {
    log('drop_malformed_item', path);
    return null;
  }
  dropUnknownKeys(raw, LEAF_KEYS, path, log);

  if (!isLeafTag(raw.tag)) {
    log('unknown_leaf_tag', `${path}.tag`);
  }

  return {
    leaf_id: typeof raw.leaf_id === 'string' ? raw.leaf_id : '',
    tag: raw.tag,
    text: raw.text,
  };
}

function readEffects(raw: unknown, path: string, log: RepairLog): Effect[] {
  if (!Array.isArray(raw)) {
    log('default_field', path);
    return [];
  }

  const effects: Effect[] = [];
  raw.forEach((item, index) => {
    const at = `${path}[${index}]`;
    if (!isRecord(item) || typeof item.effect_text !== 'string') {
      log('drop_malformed_item', at);
      return;
    }
    dropUnknownKeys(item, EFFECT_KEYS, at, log);
    effects.push({
      effect_id: typeof item.effect_id === 'string' ? item.effect_id : '',
      effect_text: item.effect_text,
    });
  });
  return effects;
}

/**
 * Renumber branch, leaf and effect ids as B{n}, B{n}.C{m}, B{n}.E{m}
 * wherever the existing ids differ from that scheme.
 */
function renumber(branches: BranchDraft[], path: string, log: RepairLog): BranchDraft[] {
  const branchIdsOk = branches.every((b, i) => b.branch_id === `B${i + 1}`);
  if (!branchIdsOk) {
    log('renumber_branch_ids', `${path}.branches`);
  }

  return branches.map((branch, index) => {
    const branchId = `B${index + 1}`;
    const at = `${path}.branches[${index}]`;
    const next: BranchDraft = { ...branch, branch_id: branchId };

    if (branch.conditions) {
      let expected = 0;
      let leavesOk = true;
      const visit = (node: ConditionNode) => {
        if (isSubtree(node)) {
          node.items.forEach(visit);
        } else if (node.leaf_id !== `${branchId}.C${++expected}`) {
          leavesOk = false;
        }
      };
      visit(branch.conditions);

      if (!leavesOk) {
        log('renumber_leaf_ids', `${at}.conditions`);
        let counter = 0;
        const relabel = (node: ConditionNode): ConditionNode =>
          isSubtree(node)
            ? { op: node.op, items: node.items.map(relabel) }
            : { ...node, leaf_id: `${branchId}.C${++counter}` };
        next.conditions = { op: branch.conditions.op, items: branch.conditions.items.map(relabel) };
      }
    }

    const effectsOk = branch.effects.every((e, i) => e.effect_id === `${branchId}.E${i + 1}`);
    if (!effectsOk) {
      log('renumber_effect_ids', `${at}.effects`);
      next.effects = branch.effects.map((e, i) => ({ ...e, effect_id: `${branchId}.E${i + 1}` }));
    }

    return next;
  });
}

function flattenSameOp(node: ConditionSubtree, path: string, log: RepairLog): ConditionSubtree {
  const items: ConditionNode[] = [];
  node.items.forEach((item, index) => {
    if (!isSubtree(item)) {
      items.push(item);
      return;
    }
    const child = flattenSameOp(item, `${path}.items[${index}]`, log);
    if (child.op === node.op) {
      log('flatten_nested_op', `${path}.items[${index}]`);
      items.push(...child.items);
    } else {
      items.push(child);
    }
  });
  return { op: node.op, items };
}

function maxWidth(node: ConditionNode): number {
  if (!isSubtree(node)) {
    return 0;
  }
  return Math.max(node.items.length, ...node.items.map(maxWidth));
}

function longestTagRun(node: ConditionNode): number {
  if (!isSubtree(node)) {
    return 0;
  }
  let longest = 0;
  let run = 0;
  let previous: string | null = null;
  for (const item of node.items) {
    if (isSubtree(item)) {
      longest = Math.max(longest, longestTagRun(item));
      run = 0;
      previous = null;
      continue;
    }
    run = item.tag === previous ? run + 1 : 1;
    previous = item.tag;
    longest = Math.max(longest, run);
  }
  return longest;
}

function mergeDuplicateLeaves(node: ConditionSubtree, path: string, log: RepairLog): ConditionSubtree {
  const seen = new Set<string>();
  const items: ConditionNode[] = [];
  let merged = false;

  node.items.forEach((item, index) => {
    if (isSubtree(item)) {
      items.push(mergeDuplicateLeaves(item, `${path}.items[${index}]`, log));
      return;
    }
    const key = `${item.tag}\u0000${item.text}`;
    if (seen.has(key)) {
      merged = true;
      return;
    }
    seen.add(key);
    items.push(item);
  });

  if (merged) {
    log('merge_duplicate_leaves', path);
  }
  return { op: node.op, items };
}

function compressRuns(
  node: ConditionSubtree,
  minRun: number,
  path: string,
  onCompress: () => void
): ConditionSubtree {
  const items: ConditionNode[] = [];
  let run: ConditionLeaf[] = [];

  const flush = () => {
    if (run.length >= minRun) {
      const tag = run[0].tag;
      items.push({ leaf_id: '', tag, text: `${COMPRESSED_PREFIX}${tag}` });
      onCompress();
    } else {
      items.push(...run);
    }
    run = [];
  };

  node.items.forEach((item, index) => {
    if (isSubtree(item)) {
      flush();
      items.push(compressRuns(item, minRun, `${path}.items[${index}]`, onCompress));
      return;
    }
    if (run.length > 0 && run[0].tag !== item.tag) {
      flush();
    }
    run.push(item);
  });
  flush();

  return { op: node.op, items };
}

function freezeBranch(draft: BranchDraft): Branch {
  return {
    branch_id: draft.branch_id,
    anchor: draft.anchor,
    norm_kind: draft.norm_kind,
    conditions: draft.conditions ?? { op: 'AND', items: [] },
    effects: draft.effects,
    depends_on_units: draft.depends_on_units,
    depends_on_article_ref: draft.depends_on_article_ref,
    unresolved_reference: draft.unresolved_reference,
    notes: draft.notes,
  };
}
