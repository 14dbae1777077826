/**
 * Evaluation System Type Definitions
 *
 * Types for gold datasets, prediction files and run outputs
 */

import type { HeadlineMetrics, MetricCounts, MetricRates } from '../src/core/MetricAggregator.js';
import type { ScoringOptions } from '../src/core/options.js';
import type { PredictionInput, SampleScore } from '../src/core/SampleEvaluator.js';
import type { StructuredUnit } from '../src/core/types.js';

/**
 * Provision-level input of a gold item
 */
export interface ProvisionInput {
  rule_id: string;
  law_title: string;
  article_number: string;
  rule_text: string;
  full_article_text: string;
}

/**
 * One gold item as stored in the dataset file
 */
export interface GoldItem {
  item_id: string;
  language?: string;
  subset?: string;
  source_type?: string;
  input: {
    rule_id: string;
    law_title?: string;
    article_number?: string;
    rule_text: string;
    full_article_text?: string;
  };
  gold: {
    units: unknown[];
  };
}

export interface GoldDataset {
  format_version?: string;
  created_at?: string;
  dataset_id?: string;
  items: GoldItem[];
}

/**
 * Gold item after its units went through the normalizer
 */
export interface GoldSample {
  itemId: string;
  ruleId: string;
  language: string;
  subset: string;
  input: ProvisionInput;
  units: StructuredUnit[];
}

/**
 * Predictions indexed by normalized rule id
 */
export interface PredictionIndex {
  byRuleId: Map<string, PredictionInput>;
  /** Records that could not be attributed to a rule id */
  skipped: number;
  /** Later records for an already-seen rule id or unit key */
  duplicates: number;
}

/**
 * Evaluation options (from CLI or programmatic use)
 */
export interface EvalOptions {
  /** Evaluate only the first n gold items */
  limit?: number;
  /** Deterministic fraction of gold items, ranked by seeded hash */
  sampleFrac?: number;
  sampleSeed?: string;
  /** Parallel workers (default from SGDT_WORKERS) */
  workers?: number;
  /** Run directory; defaults to <SGDT_OUTPUT_DIR>/<run id> */
  outputDir?: string;
  /** Whether to write outputs (default: true) */
  saveLocal?: boolean;
  strict?: boolean;
  scoring?: Partial<ScoringOptions>;
}

export interface MissingSample {
  itemId: string;
  ruleId: string;
}

/**
 * One line of per_sample.jsonl
 */
export interface PerSampleRecord extends SampleScore {
  itemId: string;
  language: string;
  subset: string;
}

export interface RunMetadata {
  runId: string;
  goldPath: string;
  predictionsPath: string;
  generatedAt: string;
  totalGold: number;
  evaluated: number;
  settings: {
    limit?: number;
    sampleFrac?: number;
    sampleSeed?: string;
    workers: number;
    scoring: ScoringOptions;
  };
}

export interface FullMetrics {
  metadata: RunMetadata;
  headline: HeadlineMetrics;
  counts: MetricCounts;
  rates: MetricRates;
  /** Per gold subset */
  bySubset: Record<string, { samples: number; rates: MetricRates }>;
  missingSamples: MissingSample[];
  predictions: {
    skipped: number;
    duplicates: number;
    /** Predictions whose rule id matches no gold item */
    unused: number;
  };
}

export interface EvaluationRunResult {
  outputDir: string | null;
  metrics: FullMetrics;
  samples: PerSampleRecord[];
}

/**
 * Record of predictions_fixed.json
 */
export interface FixedPrediction {
  rule_id: string;
  prediction: StructuredUnit[];
}
