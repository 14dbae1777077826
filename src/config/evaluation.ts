import dotenv from 'dotenv';
import { DEFAULT_SCORING_OPTIONS, type ScoringOptions } from '../core/options.js';

dotenv.config();

/**
 * Evaluation Configuration
 *
 * Scoring thresholds and run settings from the environment. Values that
 * are missing or out of range fall back to the defaults.
 */

export interface EvaluationSettings {
  scoring: Partial<ScoringOptions>;
  /** Samples evaluated concurrently */
  workers: number;
  /** Parent directory for run outputs */
  outputDir: string;
}

const DEFAULT_WORKERS = 8;
const DEFAULT_OUTPUT_DIR = 'evals/results';

export class EvaluationConfig {
  /**
   * Read settings from process.env
   */
  static getConfig(): EvaluationSettings {
    return {
      scoring: {
        unitOverlapThreshold: readFraction(
          'SGDT_UNIT_OVERLAP_THRESHOLD',
          DEFAULT_SCORING_OPTIONS.unitOverlapThreshold
        ),
        leafTextThreshold: readFraction('SGDT_LEAF_TEXT_THRESHOLD', DEFAULT_SCORING_OPTIONS.leafTextThreshold),
        opMismatchPenalty: readFraction('SGDT_OP_MISMATCH_PENALTY', DEFAULT_SCORING_OPTIONS.opMismatchPenalty),
        branchPruneThreshold: readFraction(
          'SGDT_BRANCH_PRUNE_THRESHOLD',
          DEFAULT_SCORING_OPTIONS.branchPruneThreshold
        ),
        iouThreshold: readFraction('SGDT_IOU_THRESHOLD', DEFAULT_SCORING_OPTIONS.iouThreshold),
      },
      workers: readPositiveInt('SGDT_WORKERS', DEFAULT_WORKERS),
      outputDir: process.env.SGDT_OUTPUT_DIR || DEFAULT_OUTPUT_DIR,
    };
  }

  /**
   * Re-read .env (useful when environment variables change)
   */
  static reset(): void {
    dotenv.config({ override: true });
  }
}

function readFraction(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    console.warn(`⚠️  Ignoring ${name}=${raw} (expected a number in [0, 1]), using ${fallback}`);
    return fallback;
  }
  return value;
}

function readPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    console.warn(`⚠️  Ignoring ${name}=${raw} (expected a positive integer), using ${fallback}`);
    return fallback;
  }
  return value;
}
