import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EvaluationConfig } from './evaluation.js';

const KEYS = [
  'SGDT_LEAF_TEXT_THRESHOLD',
  'SGDT_OP_MISMATCH_PENALTY',
  'SGDT_IOU_THRESHOLD',
  'SGDT_WORKERS',
  'SGDT_OUTPUT_DIR',
];

describe('EvaluationConfig', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    vi.restoreAllMocks();
  });

  it('uses defaults when nothing is set', () => {
    const config = EvaluationConfig.getConfig();
    expect(config.workers).toBe(8);
    expect(config.outputDir).toBe('evals/results');
    expect(config.scoring.leafTextThreshold).toBe(0.8);
    expect(config.scoring.iouThreshold).toBe(0.8);
  });

  it('reads overrides from the environment', () => {
    process.env.SGDT_LEAF_TEXT_THRESHOLD = '0.9';
    process.env.SGDT_WORKERS = '3';
    process.env.SGDT_IOU_THRESHOLD = '0.5';
    process.env.SGDT_OUTPUT_DIR = 'out';

    const config = EvaluationConfig.getConfig();
    expect(config.scoring.leafTextThreshold).toBe(0.9);
    expect(config.workers).toBe(3);
    expect(config.scoring.iouThreshold).toBe(0.5);
    expect(config.outputDir).toBe('out');
  });

  it('falls back on out-of-range values with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    process.env.SGDT_OP_MISMATCH_PENALTY = '1.5';
    process.env.SGDT_WORKERS = 'many';

    const config = EvaluationConfig.getConfig();
    expect(config.scoring.opMismatchPenalty).toBe(0.5);
    expect(config.workers).toBe(8);
    expect(warn).toHaveBeenCalledTimes(2);
  });
});
