/**
 * Report Formatter
 *
 * Formats run metrics for console output and the run README
 */

import type { FullMetrics } from '../types.js';

/**
 * Format run metrics for console display
 *
 * Headline table, sample status counts and a per-subset breakdown.
 */
export function formatRunSummary(metrics: FullMetrics): string {
  const lines: string[] = [];
  const { counts } = metrics;

  // Header
  lines.push('');
  lines.push('━'.repeat(80));
  lines.push(`📊 Evaluation Run: ${metrics.metadata.runId}`);
  lines.push('━'.repeat(80));
  lines.push('');

  lines.push('Samples:');
  lines.push(`  Evaluated: ${counts.samples}`);
  lines.push(`  ✅ Parsed: ${counts.parseOk} (schema-clean: ${counts.schemaOk})`);
  lines.push(`  ❌ Unparseable: ${counts.unparseable}`);
  lines.push(`  ⚪ Missing: ${counts.missing}`);
  lines.push(`  🔧 Repairs applied: ${counts.repairs.total} across ${counts.repairedSamples} samples`);
  lines.push('');

  lines.push('Headline Metrics:');
  const labelWidth = Math.max(...Object.keys(metrics.headline).map((k) => k.length));
  for (const [name, value] of Object.entries(metrics.headline)) {
    lines.push(`  ${padRight(name, labelWidth)}  ${formatRate(value)}`);
  }
  lines.push('');

  lines.push('━'.repeat(80));
  lines.push('');
  lines.push(formatSubsetBreakdown(metrics));
  lines.push('');
  lines.push('━'.repeat(80));
  lines.push('');

  return lines.join('\n');
}

/**
 * Format the per-subset breakdown as a table
 */
export function formatSubsetBreakdown(metrics: FullMetrics): string {
  const lines: string[] = [];
  const groups = Object.entries(metrics.bySubset);

  lines.push('Breakdown by Subset:');
  lines.push('');

  if (groups.length === 0) {
    lines.push('  (No data available)');
    return lines.join('\n');
  }

  const labelWidth = Math.max(15, ...groups.map(([label]) => label.length));
  const columnWidth = 13;

  const headerLine = [
    padRight('Subset', labelWidth),
    padRight('Count', 7),
    padRight('Branch-F1', columnWidth),
    padRight('Structural-F1', columnWidth),
    padRight('LeafTag-F1', columnWidth),
  ].join(' │ ');

  lines.push('  ┌' + '─'.repeat(headerLine.length) + '┐');
  lines.push('  │' + headerLine + '│');
  lines.push('  ├' + '─'.repeat(headerLine.length) + '┤');

  for (const [label, group] of groups) {
    const row = [
      padRight(label || '(none)', labelWidth),
      padRight(String(group.samples), 7),
      padRight(formatRate(group.rates.branch.f1), columnWidth),
      padRight(formatRate(group.rates.structural.f1), columnWidth),
      padRight(formatRate(group.rates.leafTag.f1), columnWidth),
    ].join(' │ ');

    lines.push('  │' + row + '│');
  }

  lines.push('  └' + '─'.repeat(headerLine.length) + '┘');

  return lines.join('\n');
}

/**
 * Format run metrics as the run README
 */
export function formatAsMarkdown(metrics: FullMetrics): string {
  const lines: string[] = [];
  const { metadata, counts } = metrics;

  lines.push(`# Evaluation Run`);
  lines.push('');
  lines.push(`**Run ID:** \`${metadata.runId}\``);
  lines.push(`**Generated:** ${metadata.generatedAt}`);
  lines.push(`**Gold:** \`${metadata.goldPath}\``);
  lines.push(`**Predictions:** \`${metadata.predictionsPath}\``);
  lines.push('');
  lines.push('---');
  lines.push('');

  lines.push('## Headline Metrics');
  lines.push('');
  lines.push('| Metric | Value |');
  lines.push('|--------|-------|');
  for (const [name, value] of Object.entries(metrics.headline)) {
    lines.push(`| ${name} | ${formatRate(value)} |`);
  }
  lines.push('');

  lines.push('## Samples');
  lines.push('');
  lines.push(`- **Gold items:** ${metadata.totalGold}`);
  lines.push(`- **Evaluated:** ${counts.samples}`);
  lines.push(`- **Parsed:** ${counts.parseOk}`);
  lines.push(`- **Schema-clean:** ${counts.schemaOk}`);
  lines.push(`- **Unparseable:** ${counts.unparseable}`);
  lines.push(`- **Missing:** ${counts.missing}`);
  lines.push(`- **Repairs:** ${counts.repairs.total} (${counts.repairs.rejectedUnits} units rejected)`);
  lines.push('');

  const repairCodes = Object.entries(counts.repairs.byCode);
  if (repairCodes.length > 0) {
    lines.push('### Repairs by Code');
    lines.push('');
    lines.push('| Code | Count |');
    lines.push('|------|-------|');
    for (const [code, count] of repairCodes) {
      lines.push(`| \`${code}\` | ${count} |`);
    }
    lines.push('');
  }

  lines.push('## Missing Samples');
  lines.push('');
  if (metrics.missingSamples.length === 0) {
    lines.push('*None*');
  } else {
    lines.push('| Item | Rule ID |');
    lines.push('|------|---------|');
    for (const missing of metrics.missingSamples) {
      lines.push(`| ${missing.itemId} | ${missing.ruleId} |`);
    }
  }
  lines.push('');

  lines.push('## Files');
  lines.push('');
  lines.push('- `metrics.json`: headline metrics');
  lines.push('- `metrics_full.json`: counts, rates, repair and span statistics, settings');
  lines.push('- `per_sample.jsonl`: one scored sample per line with its match results');
  lines.push('- `predictions_fixed.json`: schema-fixed predictions');
  lines.push('');

  return lines.join('\n');
}

export function formatRate(value: number): string {
  return value.toFixed(4);
}

/**
 * Pad string to right with spaces
 */
function padRight(str: string, width: number): string {
  if (str.length >= width) {
    return str.substring(0, width);
  }
  return str + ' '.repeat(width - str.length);
}
