import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadGoldDataset, parseGoldDataset, provisionText } from './gold-dataset-loader.js';
import { GoldMalformationError } from '../../src/core/errors.js';
import { payWagesBranch, terminateBranch, unit, UNIT_TEXT } from '../../src/testing/fixtures.js';

function goldItem(itemId: string, ruleId = 'R1') {
  const branches: unknown[] = [payWagesBranch(), terminateBranch()];
  return {
    item_id: itemId,
    subset: 'core',
    input: { rule_id: ruleId, rule_text: UNIT_TEXT },
    gold: { units: [{ unit_id: 'U1', unit_text: UNIT_TEXT, branches }] },
  };
}

describe('parseGoldDataset', () => {
  it('fills provision fields from the item input', () => {
    const [sample] = parseGoldDataset({ items: [goldItem('item-1', 'R1|')] });

    expect(sample.itemId).toBe('item-1');
    expect(sample.ruleId).toBe('R1');
    expect(sample.language).toBe('');
    expect(sample.subset).toBe('core');
    expect(sample.units).toEqual([
      unit([payWagesBranch(), terminateBranch()], { law_title: '', article_number: '' }),
    ]);
  });

  it('accepts a bare item array', () => {
    expect(parseGoldDataset([goldItem('item-1'), goldItem('item-2', 'R2')]).map((s) => s.ruleId)).toEqual(['R1', 'R2']);
  });

  it('rejects items off the schema', () => {
    expect(() => parseGoldDataset({ items: [{ item_id: 'item-1', gold: { units: [] } }] })).toThrow(
      GoldMalformationError
    );
    expect(() => parseGoldDataset({ items: [{ item_id: 'item-1', gold: { units: [] } }] })).toThrow(
      /^gold: does not match the gold dataset schema/
    );
  });

  it('rejects units without an id', () => {
    const item = goldItem('item-1');
    item.gold.units[0].unit_id = '';
    expect(() => parseGoldDataset([item])).toThrow(GoldMalformationError);
  });

  it('rejects units whose content would need repair', () => {
    const item = goldItem('item-1');
    const malformed = {
      ...item,
      gold: {
        units: [
          {
            unit_id: 'U1',
            unit_text: UNIT_TEXT,
            branches: [{ ...payWagesBranch(), norm_kind: 'NOT_A_KIND', conditions: 'garbage', effects: 'none' }],
          },
        ],
      },
    };

    expect(() => parseGoldDataset([malformed])).toThrow(GoldMalformationError);
    expect(() => parseGoldDataset([malformed])).toThrow(
      /coerce_norm_kind@items\[0\]\.gold\.units\[0\]\.branches\[0\]\.norm_kind/
    );
  });

  it('rejects a lower-case operator', () => {
    const branch = payWagesBranch();
    const item = goldItem('item-1');
    item.gold.units[0].branches = [{ ...branch, conditions: { ...branch.conditions, op: 'and' } }];
    expect(() => parseGoldDataset([item])).toThrow(/coerce_op@/);
  });

  it('accepts branches that omit optional fields', () => {
    const { branch_id, anchor, norm_kind, conditions, effects } = payWagesBranch();
    const item = goldItem('item-1');
    item.gold.units[0].branches = [{ branch_id, anchor, norm_kind, conditions, effects }];
    const [sample] = parseGoldDataset([item]);
    expect(sample.units[0].branches[0]).toEqual(payWagesBranch());
  });

  it('rejects duplicate item ids', () => {
    expect(() => parseGoldDataset([goldItem('item-1'), goldItem('item-1')])).toThrow(
      "gold: duplicate item_id 'item-1' at items[1]"
    );
  });
});

describe('loadGoldDataset', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sgdt-gold-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads JSON Lines item files', async () => {
    const file = path.join(dir, 'gold.jsonl');
    await fs.writeFile(file, [goldItem('item-1'), goldItem('item-2', 'R2')].map((i) => JSON.stringify(i)).join('\n'));
    const samples = await loadGoldDataset(file);
    expect(samples.map((s) => s.itemId)).toEqual(['item-1', 'item-2']);
  });

  it('reports a missing file', async () => {
    const file = path.join(dir, 'absent.json');
    await expect(loadGoldDataset(file)).rejects.toThrow(`${file}: gold file not found`);
  });

  it('reports invalid JSON', async () => {
    const file = path.join(dir, 'gold.json');
    await fs.writeFile(file, '{ "items": [');
    await expect(loadGoldDataset(file)).rejects.toBeInstanceOf(GoldMalformationError);
  });
});

describe('provisionText', () => {
  it('joins rule and article text', () => {
    const [sample] = parseGoldDataset([goldItem('item-1')]);
    expect(provisionText(sample)).toBe(UNIT_TEXT);
    expect(provisionText({ ...sample, input: { ...sample.input, full_article_text: '第二款。' } })).toBe(
      `${UNIT_TEXT}\n第二款。`
    );
  });
});
