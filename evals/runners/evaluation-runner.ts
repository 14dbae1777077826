/**
 * Evaluation Runner
 *
 * Main orchestrator: loads gold and predictions, scores every selected
 * provision and writes the run directory.
 */

import path from 'path';
import pLimit from 'p-limit';
import { loadGoldDataset, provisionText } from '../loaders/gold-dataset-loader.js';
import { loadPredictions } from '../loaders/prediction-loader.js';
import { formatAsMarkdown, formatRunSummary } from '../analyzers/report-formatter.js';
import { selectFraction } from '../utils/sample-selection.js';
import type {
  EvalOptions,
  EvaluationRunResult,
  FixedPrediction,
  FullMetrics,
  GoldSample,
  MissingSample,
  PerSampleRecord,
} from '../types.js';
import { EvaluationConfig } from '../../src/config/evaluation.js';
import { computeRates, foldCounts, headlineMetrics, type MetricRates } from '../../src/core/MetricAggregator.js';
import { resolveScoringOptions } from '../../src/core/options.js';
import { type EvaluatedSample, SampleEvaluator } from '../../src/core/SampleEvaluator.js';
import { SchemaNormalizer } from '../../src/core/SchemaNormalizer.js';
import { writeJson, writeJsonl, atomicWrite } from '../../src/utils/io.js';
import { RunLogger } from '../../src/utils/logger.js';
import { parsePredictionText } from '../../src/utils/validators.js';

interface ScoredSample {
  gold: GoldSample;
  evaluated: EvaluatedSample;
}

/**
 * Run evaluation of a prediction file against a gold dataset
 *
 * @param goldPath - Gold dataset (.json or .jsonl)
 * @param predictionsPath - Predictions (.json or .jsonl)
 * @param options - Evaluation options
 */
export async function runEvaluation(
  goldPath: string,
  predictionsPath: string,
  options: EvalOptions = {}
): Promise<EvaluationRunResult> {
  const settings = EvaluationConfig.getConfig();
  const scoring = resolveScoringOptions({
    ...settings.scoring,
    ...options.scoring,
    strictSchema: options.strict ?? options.scoring?.strictSchema ?? false,
  });
  const workers = options.workers ?? settings.workers;
  const runId = `eval-${new Date().toISOString().replace(/[:.]/g, '-')}`;
  const log = new RunLogger(runId);

  console.log(`\n🚀 Starting evaluation ${runId}\n`);
  log.started({ goldPath, predictionsPath, workers, strict: scoring.strictSchema });

  // Load gold
  console.log('📥 Loading gold dataset...');
  const normalizer = new SchemaNormalizer();
  const allGold = await loadGoldDataset(goldPath, normalizer);
  console.log(`✅ Loaded ${allGold.length} gold items`);

  // sampling ranks the whole dataset; the limit then takes a prefix of the ranking
  let selected = allGold;
  if (options.sampleFrac !== undefined) {
    selected = selectFraction(selected, options.sampleFrac, options.sampleSeed ?? '0', (s) => s.itemId);
    console.log(`\n📊 Sampled ${selected.length} items (frac=${options.sampleFrac}, seed=${options.sampleSeed ?? '0'})`);
  }
  if (options.limit !== undefined && options.limit < selected.length) {
    selected = selected.slice(0, Math.max(0, options.limit));
    console.log(`\n📊 Limiting to first ${selected.length} items`);
  }

  // Load predictions
  console.log('\n📥 Loading predictions...');
  const predictions = await loadPredictions(predictionsPath);
  console.log(`✅ Loaded predictions for ${predictions.byRuleId.size} provisions`);
  if (predictions.skipped > 0 || predictions.duplicates > 0) {
    console.warn(`⚠️  Skipped ${predictions.skipped} unattributable and ${predictions.duplicates} duplicate records`);
  }

  // Score
  console.log(`\n🎯 Evaluating ${selected.length} provisions with ${workers} workers...\n`);
  const evaluator = new SampleEvaluator(scoring, normalizer);
  const limit = pLimit(workers);
  let completed = 0;

  const scored = await Promise.all(
    selected.map((gold) =>
      limit(async (): Promise<ScoredSample> => {
        const input = {
          ruleId: gold.ruleId,
          provisionText: provisionText(gold),
          gold: gold.units,
          prediction: predictions.byRuleId.get(gold.ruleId) ?? { kind: 'missing' as const },
        };
        let evaluated: EvaluatedSample;
        try {
          evaluated = evaluator.evaluate(input);
        } catch (error) {
          // a corrupt sample scores zero instead of aborting the run
          log.sampleFailed(gold.itemId, error);
          evaluated = evaluator.evaluate({ ...input, prediction: { kind: 'text', text: '' } });
        }
        completed++;
        if (evaluated.score.repairs.length > 0) {
          log.sampleRepaired(gold.itemId, evaluated.score.repairs);
        }
        const percent = Math.round((completed / selected.length) * 100);
        process.stdout.write(`\r[${completed}/${selected.length}] (${percent}%) Last: ${gold.itemId.substring(0, 35)}`);
        return { gold, evaluated };
      })
    )
  );
  if (selected.length > 0) {
    process.stdout.write('\n');
  }

  const samples: PerSampleRecord[] = scored.map(({ gold, evaluated }) => ({
    itemId: gold.itemId,
    language: gold.language,
    subset: gold.subset,
    ...evaluated.score,
  }));

  const counts = foldCounts(samples.map((s) => s.counts));
  const rates = computeRates(counts);
  const missingSamples: MissingSample[] = samples
    .filter((s) => s.status === 'missing')
    .map((s) => ({ itemId: s.itemId, ruleId: s.ruleId }));
  const goldRuleIds = new Set(allGold.map((g) => g.ruleId));

  const metrics: FullMetrics = {
    metadata: {
      runId,
      goldPath,
      predictionsPath,
      generatedAt: new Date().toISOString(),
      totalGold: allGold.length,
      evaluated: samples.length,
      settings: {
        limit: options.limit,
        sampleFrac: options.sampleFrac,
        sampleSeed: options.sampleSeed,
        workers,
        scoring,
      },
    },
    headline: headlineMetrics(rates),
    counts,
    rates,
    bySubset: subsetBreakdown(samples),
    missingSamples,
    predictions: {
      skipped: predictions.skipped,
      duplicates: predictions.duplicates,
      unused: [...predictions.byRuleId.keys()].filter((id) => !goldRuleIds.has(id)).length,
    },
  };

  console.log(formatRunSummary(metrics));

  let outputDir: string | null = null;
  if (options.saveLocal !== false) {
    outputDir = options.outputDir ?? path.join(process.cwd(), settings.outputDir, runId);
    await saveRunOutputs(outputDir, metrics, samples, fixedPredictions(scored));
    console.log(`💾 Results saved to: ${outputDir}`);
  }

  log.completed({
    evaluated: counts.samples,
    missing: counts.missing,
    unparseable: counts.unparseable,
    outputDir,
  });

  return { outputDir, metrics, samples };
}

/**
 * Rates per gold subset, each folded from its own counts
 */
function subsetBreakdown(samples: readonly PerSampleRecord[]): Record<string, { samples: number; rates: MetricRates }> {
  const groups = new Map<string, PerSampleRecord[]>();
  for (const sample of samples) {
    const group = groups.get(sample.subset) ?? [];
    group.push(sample);
    groups.set(sample.subset, group);
  }

  const breakdown: Record<string, { samples: number; rates: MetricRates }> = {};
  for (const subset of [...groups.keys()].sort()) {
    const group = groups.get(subset) ?? [];
    breakdown[subset] = {
      samples: group.length,
      rates: computeRates(foldCounts(group.map((s) => s.counts))),
    };
  }
  return breakdown;
}

function fixedPredictions(scored: readonly ScoredSample[]): FixedPrediction[] {
  const records: FixedPrediction[] = [];
  for (const { gold, evaluated } of scored) {
    if (evaluated.fixed) {
      records.push({ rule_id: gold.ruleId, prediction: evaluated.fixed });
    }
  }
  return records;
}

/**
 * Write the run directory
 */
export async function saveRunOutputs(
  outputDir: string,
  metrics: FullMetrics,
  samples: readonly PerSampleRecord[],
  fixed: readonly FixedPrediction[]
): Promise<void> {
  await writeJson(path.join(outputDir, 'metrics.json'), metrics.headline);
  await writeJson(path.join(outputDir, 'metrics_full.json'), metrics);
  await writeJsonl(path.join(outputDir, 'per_sample.jsonl'), samples);
  await writeJson(path.join(outputDir, 'predictions_fixed.json'), fixed);
  await atomicWrite(path.join(outputDir, 'README.md'), formatAsMarkdown(metrics));
}

/**
 * Repair a prediction file without scoring it
 *
 * @returns Number of provisions written and repairs applied
 */
export async function fixPredictions(
  predictionsPath: string,
  outputPath: string
): Promise<{ written: number; unparseable: string[]; repairs: number }> {
  const predictions = await loadPredictions(predictionsPath);
  const normalizer = new SchemaNormalizer();
  const records: FixedPrediction[] = [];
  const unparseable: string[] = [];
  let repairs = 0;

  for (const [ruleId, prediction] of predictions.byRuleId) {
    let value: unknown = null;
    if (prediction.kind === 'text') {
      value = parsePredictionText(prediction.text);
    } else if (prediction.kind === 'value') {
      value = prediction.value;
    }

    const normalized = value === null || value === undefined ? null : normalizer.normalizeUnits(value);
    repairs += normalized?.repairs.length ?? 0;
    if (normalized?.units) {
      records.push({ rule_id: ruleId, prediction: normalized.units });
    } else {
      unparseable.push(ruleId);
    }
  }

  await writeJson(outputPath, records);
  return { written: records.length, unparseable, repairs };
}
