/**
 * Shared test fixtures: one provision with one unit and two branches.
 */

import type { Branch, ConditionLeaf, ConditionNode, Effect, NormKind, StructuredUnit } from '../core/types.js';

export const UNIT_TEXT = '用人单位应当按时足额支付劳动者工资。用人单位可以依法解除劳动合同。';

export function leaf(leaf_id: string, tag: string, text: string): ConditionLeaf {
  return { leaf_id, tag, text };
}

export function effect(effect_id: string, effect_text: string): Effect {
  return { effect_id, effect_text };
}

export function branch(
  branch_id: string,
  norm_kind: NormKind,
  anchor: string,
  items: ConditionNode[],
  effects: Effect[]
): Branch {
  return {
    branch_id,
    anchor: { text: anchor, occurrence: 1 },
    norm_kind,
    conditions: { op: 'AND', items },
    effects,
    depends_on_units: [],
    depends_on_article_ref: [],
    unresolved_reference: false,
    notes: '',
  };
}

export function payWagesBranch(): Branch {
  return branch(
    'B1',
    'OBLIGATION',
    '应当按时足额支付',
    [leaf('B1.C1', '主体', '用人单位'), leaf('B1.C2', '对象', '劳动者工资')],
    [effect('B1.E1', '按时足额支付劳动者工资')]
  );
}

export function terminateBranch(): Branch {
  return branch(
    'B2',
    'RIGHT',
    '可以依法解除',
    [leaf('B2.C1', '主体', '用人单位'), leaf('B2.C2', '方式', '依法')],
    [effect('B2.E1', '解除劳动合同')]
  );
}

/** A PERMISSION branch with no gold counterpart */
export function spuriousBranch(): Branch {
  return branch('B3', 'PERMISSION', '足额', [leaf('B3.C1', '行为', '支付')], [effect('B3.E1', '劳动者工资')]);
}

export function unit(branches: Branch[], overrides: Partial<StructuredUnit> = {}): StructuredUnit {
  return {
    schema_version: 'st2.v3',
    rule_id: 'R1',
    law_title: '劳动法',
    article_number: '第一条',
    rule_text: UNIT_TEXT,
    unit_id: 'U1',
    unit_text: UNIT_TEXT,
    unit_reason: '',
    branches,
    meta: {},
    ...overrides,
  };
}

export function goldUnit(): StructuredUnit {
  return unit([payWagesBranch(), terminateBranch()]);
}
