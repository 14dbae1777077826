#!/usr/bin/env node

/**
 * Evaluation CLI
 *
 * Command-line interface for scoring structured-annotation predictions
 */

import path from 'path';
import { fixPredictions, runEvaluation } from './runners/evaluation-runner.js';
import { parseArgs } from './utils/cli-args.js';
import { GoldMalformationError, PredictionFormatError } from '../src/core/errors.js';

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
SG-DT Structured Annotation Evaluation

USAGE:
  npm run eval <command> [options]

COMMANDS:
  run --gold <path> --pred <path>     Score predictions against a gold dataset
  fix --pred <path> [--out <path>]    Write schema-fixed predictions without scoring
  help                                Show this message

RUN OPTIONS:
  --out <dir>              Run directory (default: <SGDT_OUTPUT_DIR>/<run id>)
  --limit <n>              Evaluate only the first n gold items
  --sample-frac <f>        Deterministic fraction of gold items (0..1)
  --sample-seed <s>        Seed for --sample-frac (default: 0)
  --workers <n>            Parallel workers (default: SGDT_WORKERS or 8)
  --strict                 Score predictions that needed any repair as unparseable
  --no-save                Print the summary without writing files

EXAMPLES:
  npm run eval run --gold data/gold.json --pred runs/model-a/predictions.jsonl
  npm run eval run --gold data/gold.json --pred runs/model-a/predictions.jsonl --sample-frac 0.2 --sample-seed 7
  npm run eval run --gold data/gold.jsonl --pred runs/model-a/predictions.json --strict --workers 16
  npm run eval fix --pred runs/model-a/predictions.jsonl --out runs/model-a/predictions_fixed.json

ENVIRONMENT:
  Optional settings in .env:
    - SGDT_UNIT_OVERLAP_THRESHOLD   # unit alignment threshold (default: 0.5)
    - SGDT_LEAF_TEXT_THRESHOLD      # leaf text match threshold (default: 0.8)
    - SGDT_OP_MISMATCH_PENALTY      # AND/OR mismatch multiplier (default: 0.5)
    - SGDT_BRANCH_PRUNE_THRESHOLD   # branch pre-filter threshold (default: 0.2)
    - SGDT_WORKERS                  # parallel workers (default: 8)
    - SGDT_OUTPUT_DIR               # run output parent (default: evals/results)
    - LOG_LEVEL                     # winston log level (default: info)
`);
}

/**
 * Run evaluation command
 */
async function runCommand(args: string[]): Promise<void> {
  const parsed = parseArgs(args);
  if (!parsed.gold || !parsed.pred) {
    console.error('Error: --gold and --pred are required');
    console.error('Usage: npm run eval run --gold <path> --pred <path>');
    process.exit(1);
  }

  const result = await runEvaluation(parsed.gold, parsed.pred, parsed.options);

  console.log(`\n✨ Evaluation complete!`);
  console.log(`   Run ID: ${result.metrics.metadata.runId}`);
  if (result.metrics.missingSamples.length > 0) {
    console.log(`   ⚠️  ${result.metrics.missingSamples.length} gold items had no prediction (see README.md)`);
  }
}

/**
 * Fix predictions command
 */
async function fixCommand(args: string[]): Promise<void> {
  const parsed = parseArgs(args);
  if (!parsed.pred) {
    console.error('Error: --pred is required');
    console.error('Usage: npm run eval fix --pred <path> [--out <path>]');
    process.exit(1);
  }

  const outputPath =
    parsed.out ?? path.join(path.dirname(parsed.pred), 'predictions_fixed.json');

  console.log(`\n🔧 Fixing predictions from ${parsed.pred}...\n`);
  const result = await fixPredictions(parsed.pred, outputPath);

  console.log(`✅ Wrote ${result.written} provisions to ${outputPath}`);
  console.log(`   Repairs applied: ${result.repairs}`);
  if (result.unparseable.length > 0) {
    console.log(`   ❌ Unparseable: ${result.unparseable.length}`);
    result.unparseable.slice(0, 10).forEach((ruleId) => console.log(`     - ${ruleId}`));
  }
}

/**
 * Main CLI entry point
 */
async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === 'help' || args[0] === '--help') {
    printHelp();
    return;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  try {
    switch (command) {
      case 'run':
        await runCommand(commandArgs);
        break;

      case 'fix':
        await fixCommand(commandArgs);
        break;

      default:
        console.error(`Unknown command: ${command}\n`);
        printHelp();
        process.exit(1);
    }
  } catch (error) {
    if (error instanceof GoldMalformationError || error instanceof PredictionFormatError) {
      console.error(`\n❌ ${error.name}: ${error.message}`);
    } else if (error instanceof Error) {
      console.error('\n❌ Error:', error.message);
      if (error.stack) {
        console.error('\nStack trace:');
        console.error(error.stack);
      }
    } else {
      console.error('\n❌ Error:', String(error));
    }
    process.exit(1);
  }
}

// Run CLI
main().catch((error) => {
  console.error(error);
  process.exit(1);
});
