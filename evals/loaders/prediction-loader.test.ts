import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { indexPredictions, loadPredictions } from './prediction-loader.js';
import { PredictionFormatError } from '../../src/core/errors.js';

describe('indexPredictions', () => {
  it('indexes provision records by normalized rule id', () => {
    const index = indexPredictions([
      { rule_id: 'R1|', prediction: [{ unit_id: 'U1' }] },
      { rule_id: 'R2', prediction: '<final>[]</final>' },
    ]);
    expect(index.byRuleId.get('R1')).toEqual({ kind: 'value', value: [{ unit_id: 'U1' }] });
    expect(index.byRuleId.get('R2')).toEqual({ kind: 'text', text: '<final>[]</final>' });
    expect(index.skipped).toBe(0);
    expect(index.duplicates).toBe(0);
  });

  it('groups per-unit records into one provision', () => {
    const index = indexPredictions([
      { unit_key: 'R3#U1', structured: { unit_id: 'U1' } },
      { rule_id: 'R3', structured: { unit_id: 'U2' } },
      { unit_key: 'R3#U1', structured: { unit_id: 'U1', note: 'retry' } },
    ]);
    expect(index.byRuleId.get('R3')).toEqual({ kind: 'value', value: [{ unit_id: 'U1' }, { unit_id: 'U2' }] });
    expect(index.duplicates).toBe(1);
  });

  it('keeps the first record per rule id', () => {
    const index = indexPredictions([
      { rule_id: 'R1', prediction: [] },
      { rule_id: 'R1 ', prediction: [{}] },
      { rule_id: 'R1', unit_id: 'U1', structured: {} },
    ]);
    expect(index.byRuleId.get('R1')).toEqual({ kind: 'value', value: [] });
    expect(index.duplicates).toBe(2);
  });

  it('skips records it cannot attribute', () => {
    const index = indexPredictions(['text', { prediction: [] }, { rule_id: 'R1' }, { structured: {} }]);
    expect(index.byRuleId.size).toBe(0);
    expect(index.skipped).toBe(4);
  });
});

describe('loadPredictions', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sgdt-pred-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('accepts a predictions envelope', async () => {
    const file = path.join(dir, 'predictions.json');
    await fs.writeFile(file, JSON.stringify({ predictions: [{ rule_id: 'R1', prediction: [] }] }));
    const index = await loadPredictions(file);
    expect([...index.byRuleId.keys()]).toEqual(['R1']);
  });

  it('rejects a file that is not a record list', async () => {
    const file = path.join(dir, 'predictions.json');
    await fs.writeFile(file, JSON.stringify({ rule_id: 'R1' }));
    await expect(loadPredictions(file)).rejects.toBeInstanceOf(PredictionFormatError);
  });
});
