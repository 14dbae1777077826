/**
 * CLI argument parsing for the evaluation commands
 */

import path from 'path';
import type { EvalOptions } from '../types.js';

/**
 * Parsed command arguments
 */
export interface ParsedArgs {
  gold?: string;
  pred?: string;
  out?: string;
  options: EvalOptions;
}

function parseNumber(flag: string, value: string, integer: boolean): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || (integer && !Number.isInteger(parsed))) {
    throw new Error(`${flag} expects ${integer ? 'an integer' : 'a number'}, got '${value}'`);
  }
  return parsed;
}

export function parseArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = { options: {} };

  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if (args[i] === '--gold' && next) {
      parsed.gold = next;
      i++;
    } else if (args[i] === '--pred' && next) {
      parsed.pred = next;
      i++;
    } else if (args[i] === '--out' && next) {
      parsed.out = next;
      i++;
    } else if (args[i] === '--limit' && next) {
      parsed.options.limit = parseNumber('--limit', next, true);
      i++;
    } else if (args[i] === '--sample-frac' && next) {
      parsed.options.sampleFrac = parseNumber('--sample-frac', next, false);
      i++;
    } else if (args[i] === '--sample-seed' && next) {
      parsed.options.sampleSeed = next;
      i++;
    } else if (args[i] === '--workers' && next) {
      parsed.options.workers = Math.max(1, parseNumber('--workers', next, true));
      i++;
    } else if (args[i] === '--strict') {
      parsed.options.strict = true;
    } else if (args[i] === '--no-save') {
      parsed.options.saveLocal = false;
    } else {
      throw new Error(`Unknown or incomplete option: ${args[i]}`);
    }
  }

  if (parsed.out) {
    parsed.options.outputDir = path.resolve(parsed.out);
  }
  return parsed;
}
