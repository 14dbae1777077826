/**
 * Prediction Loader
 *
 * Reads model outputs and indexes them by rule id. Accepts provision
 * records `{rule_id, prediction}` and per-unit records
 * `{rule_id?, unit_key?, structured}`; per-unit records are grouped into
 * one prediction per provision.
 */

import { normalizeRuleId } from '../utils/sample-selection.js';
import type { PredictionIndex } from '../types.js';
import { PredictionFormatError } from '../../src/core/errors.js';
import type { PredictionInput } from '../../src/core/SampleEvaluator.js';
import { isRecord } from '../../src/core/SchemaNormalizer.js';
import { readJsonFile } from '../../src/utils/io.js';
import { createLogger } from '../../src/utils/logger.js';

const logger = createLogger('PredictionLoader');

/**
 * Load predictions from a .json array or a .jsonl file
 *
 * @throws PredictionFormatError when the file cannot be read as records
 */
export async function loadPredictions(filePath: string): Promise<PredictionIndex> {
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      throw new PredictionFormatError('predictions file not found. Check the --pred path.', filePath);
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new PredictionFormatError(`not valid JSON (${reason})`, filePath);
  }

  const records = isRecord(raw) && Array.isArray(raw.predictions) ? raw.predictions : raw;
  if (!Array.isArray(records)) {
    throw new PredictionFormatError('expected an array of prediction records (or a .jsonl file)', filePath);
  }

  const index = indexPredictions(records);
  logger.info('Loaded predictions', {
    filePath,
    records: records.length,
    provisions: index.byRuleId.size,
    skipped: index.skipped,
    duplicates: index.duplicates,
  });
  return index;
}

/**
 * Index parsed records by normalized rule id. The first record for a
 * rule id (or unit key) wins.
 */
export function indexPredictions(records: readonly unknown[]): PredictionIndex {
  const provisions = new Map<string, PredictionInput>();
  const units = new Map<string, unknown[]>();
  const seenUnitKeys = new Set<string>();
  let skipped = 0;
  let duplicates = 0;

  for (const record of records) {
    if (!isRecord(record)) {
      skipped++;
      continue;
    }

    if ('structured' in record) {
      const structured = isRecord(record.structured) ? record.structured : {};
      const unitKey = perUnitKey(record, structured);
      if (!unitKey) {
        skipped++;
        continue;
      }
      if (seenUnitKeys.has(unitKey.key)) {
        duplicates++;
        continue;
      }
      seenUnitKeys.add(unitKey.key);
      const group = units.get(unitKey.ruleId) ?? [];
      group.push(record.structured);
      units.set(unitKey.ruleId, group);
      continue;
    }

    const ruleId = typeof record.rule_id === 'string' ? normalizeRuleId(record.rule_id) : '';
    if (!ruleId || !('prediction' in record)) {
      skipped++;
      continue;
    }
    if (provisions.has(ruleId)) {
      duplicates++;
      continue;
    }
    provisions.set(
      ruleId,
      typeof record.prediction === 'string'
        ? { kind: 'text', text: record.prediction }
        : { kind: 'value', value: record.prediction }
    );
  }

  for (const [ruleId, group] of units) {
    if (provisions.has(ruleId)) {
      duplicates += group.length;
      continue;
    }
    provisions.set(ruleId, { kind: 'value', value: group });
  }

  return { byRuleId: provisions, skipped, duplicates };
}

/**
 * `rule_id#unit_id` key of a per-unit record, from unit_key or from the ids
 */
function perUnitKey(
  record: Record<string, unknown>,
  structured: Record<string, unknown>
): { ruleId: string; key: string } | null {
  if (typeof record.unit_key === 'string' && record.unit_key.includes('#')) {
    const [rawRuleId, ...rest] = record.unit_key.trim().split('#');
    const ruleId = normalizeRuleId(rawRuleId);
    return ruleId ? { ruleId, key: `${ruleId}#${rest.join('#')}` } : null;
  }

  const rawRuleId = [structured.rule_id, record.rule_id].find((v): v is string => typeof v === 'string' && v.trim() !== '');
  const unitId = [structured.unit_id, record.unit_id].find((v): v is string => typeof v === 'string' && v.trim() !== '');
  if (rawRuleId === undefined || unitId === undefined) {
    return null;
  }
  const ruleId = normalizeRuleId(rawRuleId);
  return ruleId ? { ruleId, key: `${ruleId}#${unitId}` } : null;
}
