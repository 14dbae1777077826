/**
 * Gold Dataset Loader
 *
 * Loads and validates the gold dataset. Gold units go through the
 * normalizer for typing. Defaulted optional fields, dropped unknown fields
 * and renumbered ids are logged; any repair that changes a unit's content
 * stops the run.
 */

import { GOLD_DATASET_SCHEMA } from '../config/gold-schema.js';
import { normalizeRuleId } from '../utils/sample-selection.js';
import type { GoldDataset, GoldSample } from '../types.js';
import { GoldMalformationError } from '../../src/core/errors.js';
import { isRecord, SchemaNormalizer } from '../../src/core/SchemaNormalizer.js';
import { SCHEMA_VERSION, type RepairCode, type StructuredUnit } from '../../src/core/types.js';
import { readJsonFile } from '../../src/utils/io.js';
import { createLogger, formatRepairs } from '../../src/utils/logger.js';
import { validator } from '../../src/utils/validators.js';

const logger = createLogger('GoldDatasetLoader');

/** Repairs that would score against something other than what annotators wrote */
const CONTENT_REPAIRS: ReadonlySet<RepairCode> = new Set<RepairCode>([
  'drop_exceptions',
  'coerce_norm_kind',
  'coerce_op',
  'unknown_leaf_tag',
  'drop_malformed_item',
  'wrap_root_leaf',
  'empty_conditions',
  'flatten_nested_op',
  'merge_duplicate_leaves',
  'compress_enum_run',
  'limits_exceeded',
]);

/**
 * Load gold items from a .json dataset or .jsonl item file
 *
 * @throws GoldMalformationError when the file is missing, not JSON, or off-schema
 */
export async function loadGoldDataset(
  filePath: string,
  normalizer: SchemaNormalizer = new SchemaNormalizer()
): Promise<GoldSample[]> {
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      throw new GoldMalformationError('gold file not found. Check the --gold path.', filePath);
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new GoldMalformationError(`not valid JSON (${reason})`, filePath);
  }

  const samples = parseGoldDataset(raw, filePath, normalizer);
  logger.info('Loaded gold dataset', { filePath, items: samples.length });
  return samples;
}

/**
 * Validate an already-parsed dataset. A bare array is taken as the item list.
 */
export function parseGoldDataset(
  raw: unknown,
  source = 'gold',
  normalizer: SchemaNormalizer = new SchemaNormalizer()
): GoldSample[] {
  const dataset = Array.isArray(raw) ? { items: raw } : raw;
  const check = validator.compileSchema<GoldDataset>(GOLD_DATASET_SCHEMA);
  if (!check(dataset)) {
    throw new GoldMalformationError(
      `does not match the gold dataset schema:\n${validator.formatErrors(check.errors)}`,
      source
    );
  }

  const seen = new Set<string>();
  return dataset.items.map((item, itemIndex) => {
    if (seen.has(item.item_id)) {
      throw new GoldMalformationError(`duplicate item_id '${item.item_id}' at items[${itemIndex}]`, source);
    }
    seen.add(item.item_id);

    const ruleId = normalizeRuleId(item.input.rule_id);
    const units: StructuredUnit[] = item.gold.units.map((rawUnit, unitIndex) => {
      const path = `items[${itemIndex}].gold.units[${unitIndex}]`;
      if (!isRecord(rawUnit)) {
        throw new GoldMalformationError(`${path} is not an object`, source);
      }

      // provision-level fields come from the item input when the unit omits them
      const { unit, repairs } = normalizer.normalizeUnit(
        {
          schema_version: SCHEMA_VERSION,
          rule_id: ruleId,
          law_title: item.input.law_title ?? '',
          article_number: item.input.article_number ?? '',
          rule_text: item.input.rule_text,
          unit_reason: '',
          ...rawUnit,
        },
        path
      );
      if (!unit) {
        throw new GoldMalformationError(`${path} cannot be read as a structured unit`, source);
      }
      const contentRepairs = repairs.filter((repair) => CONTENT_REPAIRS.has(repair.code));
      if (contentRepairs.length > 0) {
        throw new GoldMalformationError(
          `${path} is not in canonical form (${formatRepairs(contentRepairs).join(', ')})`,
          source
        );
      }
      if (repairs.length > 0) {
        logger.warn('Gold unit is not in canonical form', { itemId: item.item_id, path, repairs: formatRepairs(repairs) });
      }
      return unit;
    });

    return {
      itemId: item.item_id,
      ruleId,
      language: item.language ?? '',
      subset: item.subset ?? '',
      input: {
        rule_id: ruleId,
        law_title: item.input.law_title ?? '',
        article_number: item.input.article_number ?? '',
        rule_text: item.input.rule_text,
        full_article_text: item.input.full_article_text ?? '',
      },
      units,
    };
  });
}

/**
 * Text against which inlined spans are checked
 */
export function provisionText(sample: GoldSample): string {
  return [sample.input.rule_text, sample.input.full_article_text].filter((t) => t.trim()).join('\n');
}
