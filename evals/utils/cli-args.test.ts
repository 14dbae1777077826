import path from 'path';
import { describe, expect, it } from 'vitest';
import { parseArgs } from './cli-args.js';

describe('parseArgs', () => {
  it('reads paths and run options', () => {
    const parsed = parseArgs([
      '--gold',
      'gold.json',
      '--pred',
      'pred.jsonl',
      '--limit',
      '5',
      '--sample-frac',
      '0.5',
      '--sample-seed',
      'abc',
      '--strict',
      '--no-save',
    ]);
    expect(parsed).toEqual({
      gold: 'gold.json',
      pred: 'pred.jsonl',
      options: { limit: 5, sampleFrac: 0.5, sampleSeed: 'abc', strict: true, saveLocal: false },
    });
  });

  it('resolves the output directory', () => {
    const parsed = parseArgs(['--out', 'runs/a']);
    expect(parsed.out).toBe('runs/a');
    expect(parsed.options.outputDir).toBe(path.resolve('runs/a'));
  });

  it('clamps workers to at least one', () => {
    expect(parseArgs(['--workers', '0']).options.workers).toBe(1);
  });

  it('rejects malformed numbers', () => {
    expect(() => parseArgs(['--limit', '2.5'])).toThrow("--limit expects an integer, got '2.5'");
  });

  it('rejects unknown and incomplete options', () => {
    expect(() => parseArgs(['--verbose'])).toThrow('Unknown or incomplete option: --verbose');
    expect(() => parseArgs(['--gold'])).toThrow('Unknown or incomplete option: --gold');
  });
});
