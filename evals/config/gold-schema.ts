/**
 * Gold Dataset Schema
 *
 * JSON schema for the envelope of gold items. Unit contents are only
 * checked for the identifying fields here; their full shape goes through
 * the schema normalizer, which may default or renumber fields but must
 * not change their content.
 */

const goldUnitSchema = {
  type: 'object',
  required: ['unit_id', 'unit_text', 'branches'],
  properties: {
    unit_id: { type: 'string', minLength: 1 },
    unit_text: { type: 'string' },
    branches: { type: 'array', items: { type: 'object' } },
  },
} as const;

export const GOLD_ITEM_SCHEMA = {
  type: 'object',
  required: ['item_id', 'input', 'gold'],
  properties: {
    item_id: { type: 'string', minLength: 1 },
    language: { type: 'string' },
    subset: { type: 'string' },
    source_type: { type: 'string' },
    input: {
      type: 'object',
      required: ['rule_id', 'rule_text'],
      properties: {
        rule_id: { type: 'string', minLength: 1 },
        law_title: { type: 'string' },
        article_number: { type: 'string' },
        rule_text: { type: 'string' },
        full_article_text: { type: 'string' },
      },
    },
    gold: {
      type: 'object',
      required: ['units'],
      properties: {
        units: { type: 'array', items: goldUnitSchema },
      },
    },
  },
} as const;

export const GOLD_DATASET_SCHEMA = {
  type: 'object',
  required: ['items'],
  properties: {
    format_version: { type: 'string' },
    created_at: { type: 'string' },
    dataset_id: { type: 'string' },
    items: { type: 'array', items: GOLD_ITEM_SCHEMA },
  },
} as const;
