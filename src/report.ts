import chalk from 'chalk';
import { groupMeans, percentDelta, rank, speedup } from './aggregate.js';
import { formatList, type OutputFormat } from './output.js';
import { summarizeLatency } from './prober.js';
import { UNAVAILABLE } from './types.js';
import type { AggregateResult, CategoryField, MetricField, RunResult, TargetResult } from './types.js';
import { displayName, formatNumber, formatPercent } from './values.js';

export interface TargetRow {
  name: string;
  imageType: string;
  connectionPool: string;
  profile: string;
  startupSeconds?: number;
  memoryMB?: number;
  responseSeconds?: number;
  coldSeconds?: number;
  warmSeconds?: number;
  warmCount: number;
  ok: boolean;
}

export type NumericMetric = 'startupSeconds' | 'memoryMB' | 'responseSeconds' | 'coldSeconds' | 'warmSeconds';

interface MetricSpec {
  label: string;
  unit: 's' | 'MB';
  lowLabel: string;
  highLabel: string;
}

export const NUMERIC_METRICS: Record<NumericMetric, MetricSpec> = {
  startupSeconds: { label: 'Startup', unit: 's', lowLabel: '🚀 Fastest Startup', highLabel: '🐌 Slowest Startup' },
  memoryMB: { label: 'Memory', unit: 'MB', lowLabel: '💾 Lowest Memory', highLabel: '📈 Highest Memory' },
  responseSeconds: { label: 'Metrics Response', unit: 's', lowLabel: '📡 Fastest Response', highLabel: '🐢 Slowest Response' },
  coldSeconds: { label: 'Cold', unit: 's', lowLabel: '🥶 Fastest Cold', highLabel: '🧊 Slowest Cold' },
  warmSeconds: { label: 'Warm', unit: 's', lowLabel: '🏆 Fastest Warm', highLabel: '🐢 Slowest Warm' },
};

export interface RankingEntry {
  metric: NumericMetric;
  min: { target: string; value: number };
  max: { target: string; value: number };
}

export interface GroupDelta {
  group: string;
  percent: number | undefined;
  speedup: number | undefined;
}

export interface GroupComparison {
  metric: NumericMetric;
  /** Value of the `within` field this comparison is restricted to. */
  within?: string;
  groups: AggregateResult[];
  baseline: string;
  deltas: GroupDelta[];
}

export interface Report {
  rows: TargetRow[];
  metrics: NumericMetric[];
  rankings: RankingEntry[];
  groupBy: CategoryField;
  within?: CategoryField;
  baseline: string | undefined;
  comparisons: GroupComparison[];
  failed: string[];
}

export interface ReportOptions {
  metrics: NumericMetric[];
  groupBy: CategoryField;
  /** Group every other group is compared against; defaults to the first group seen. */
  baseline?: string;
  /** Compare groups separately inside each value of this field. */
  within?: CategoryField;
  /** Fill categories missing from metrics by reading the target name. */
  inferCategories?: boolean;
  failed: string[];
}

function metricValue(result: TargetResult, field: MetricField): number | string {
  return result.metrics.find(s => s.field === field)?.value ?? UNAVAILABLE;
}

function numeric(value: number | string): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function categorical(value: number | string): string {
  return String(value);
}

/**
 * Categories implied by the demo's naming scheme: `jvm-*` and `native-*`
 * image builds, with `-pgbouncer` marking the pooled variant.
 */
export function categoriesFromName(name: string): Partial<Record<CategoryField, string>> {
  const lower = name.toLowerCase();
  const imageType = lower.includes('native') ? 'Native (GraalVM)' : lower.includes('jvm') ? 'JVM' : undefined;
  if (lower.includes('pgbouncer')) return { imageType, connectionPool: 'PgBouncer' };
  return imageType ? { imageType, connectionPool: 'Direct' } : {};
}

export function toRow(result: TargetResult, inferCategories = false): TargetRow {
  const latency = result.latency.length > 0 ? summarizeLatency(result.latency) : undefined;
  const inferred = inferCategories ? categoriesFromName(result.target.name) : {};
  const category = (field: CategoryField): string => {
    const value = categorical(metricValue(result, field));
    return value === UNAVAILABLE ? inferred[field] ?? UNAVAILABLE : value;
  };
  return {
    name: result.target.name,
    imageType: category('imageType'),
    connectionPool: category('connectionPool'),
    profile: category('profile'),
    startupSeconds: numeric(metricValue(result, 'startupTimeSeconds')),
    memoryMB: numeric(metricValue(result, 'memoryUsedMB')),
    responseSeconds: result.metricsResponseSeconds,
    coldSeconds: latency?.cold,
    warmSeconds: latency?.warmMean,
    warmCount: latency?.warmCount ?? 0,
    ok: result.errors.length === 0,
  };
}

function compareGroups(
  rows: TargetRow[],
  groupBy: CategoryField,
  metric: NumericMetric,
  baseline: string
): GroupComparison | undefined {
  const groups = groupMeans(rows, row => row[groupBy], row => row[metric]);
  const base = groups.find(g => g.key === baseline);
  if (!base || groups.length < 2) return undefined;
  return {
    metric,
    groups,
    baseline,
    deltas: groups
      .filter(g => g.key !== baseline)
      .map(g => ({
        group: g.key,
        percent: percentDelta(base.mean, g.mean),
        speedup: NUMERIC_METRICS[metric].unit === 's' ? speedup(base.mean, g.mean) : undefined,
      })),
  };
}

export function buildReport(run: RunResult, options: ReportOptions): Report {
  const rows = [...run.results.values()].map(result => toRow(result, options.inferCategories));

  const rankings: RankingEntry[] = [];
  for (const metric of options.metrics) {
    const ranking = rank(rows, row => row[metric]);
    if (ranking) {
      rankings.push({
        metric,
        min: { target: ranking.min.row.name, value: ranking.min.value },
        max: { target: ranking.max.row.name, value: ranking.max.value },
      });
    }
  }

  // Rows without the category cannot be placed in a group.
  const { groupBy, within } = options;
  const grouped = rows.filter(row => row[groupBy] !== UNAVAILABLE && (!within || row[within] !== UNAVAILABLE));
  const firstGroup = grouped.length > 0 ? grouped[0][groupBy] : undefined;
  const baseline = options.baseline ?? firstGroup;

  const partitions = new Map<string | undefined, TargetRow[]>();
  for (const row of grouped) {
    const key = within ? row[within] : undefined;
    const partition = partitions.get(key);
    if (partition) partition.push(row);
    else partitions.set(key, [row]);
  }

  const comparisons: GroupComparison[] = [];
  if (baseline !== undefined) {
    for (const [partitionKey, partitionRows] of partitions) {
      for (const metric of options.metrics) {
        const comparison = compareGroups(partitionRows, groupBy, metric, baseline);
        if (!comparison) continue;
        comparisons.push(partitionKey === undefined ? comparison : { ...comparison, within: partitionKey });
      }
    }
  }

  return {
    rows,
    metrics: options.metrics,
    rankings,
    groupBy,
    within,
    baseline,
    comparisons,
    failed: options.failed,
  };
}

function formatValue(metric: NumericMetric, value: number | undefined): string {
  return formatNumber(value, NUMERIC_METRICS[metric].unit === 'MB' ? 1 : 3);
}

function withUnit(metric: NumericMetric, value: number): string {
  return `${formatValue(metric, value)}${NUMERIC_METRICS[metric].unit}`;
}

function columnTitle(metric: NumericMetric): string {
  const spec = NUMERIC_METRICS[metric];
  return `${spec.label} (${spec.unit})`;
}

export function reportColumns(report: Report): string[] {
  const columns = ['Service', 'Type', 'Pool'];
  for (const metric of report.metrics) {
    columns.push(columnTitle(metric));
  }
  if (report.metrics.includes('warmSeconds')) columns.push('Warm Requests');
  return columns;
}

export function rowCells(report: Report): Record<string, string>[] {
  return report.rows.map(row => {
    const cells: Record<string, string> = {
      Service: displayName(row.name),
      Type: row.imageType,
      Pool: row.connectionPool,
    };
    for (const metric of report.metrics) {
      cells[columnTitle(metric)] = formatValue(metric, row[metric]);
    }
    if (report.metrics.includes('warmSeconds')) cells['Warm Requests'] = String(row.warmCount);
    return cells;
  });
}

export function rankingLines(report: Report): string[] {
  const lines: string[] = [];
  for (const entry of report.rankings) {
    const spec = NUMERIC_METRICS[entry.metric];
    lines.push(`  ${spec.lowLabel}: ${chalk.cyan(displayName(entry.min.target))} (${withUnit(entry.metric, entry.min.value)})`);
    lines.push(`  ${spec.highLabel}: ${chalk.cyan(displayName(entry.max.target))} (${withUnit(entry.metric, entry.max.value)})`);
  }
  return lines;
}

function describeDelta(metric: NumericMetric, baseline: string, delta: GroupDelta): string {
  const spec = NUMERIC_METRICS[metric];
  if (delta.percent === undefined) {
    return `  ${spec.label}: ${chalk.dim(`cannot compare ${delta.group} with ${baseline} (${UNAVAILABLE})`)}`;
  }
  const ratio = delta.speedup !== undefined && delta.percent > 0 ? ` (${delta.speedup.toFixed(2)}x)` : '';
  if (spec.unit === 'MB') {
    const direction = delta.percent >= 0 ? 'less' : 'more';
    return `  ${spec.label}: ${delta.group} uses ${formatPercent(delta.percent)} ${direction} memory than ${baseline}`;
  }
  if (delta.percent >= 0) {
    return `  ${spec.label}: ${delta.group} is ${formatPercent(delta.percent)} faster than ${baseline}${ratio}`;
  }
  return `  ${spec.label}: ${baseline} is ${formatPercent(delta.percent)} faster than ${delta.group}`;
}

export function comparisonLines(report: Report): string[] {
  const lines: string[] = [];
  for (const comparison of report.comparisons) {
    const means = comparison.groups
      .map(g => `${g.key}: ${g.mean === undefined ? UNAVAILABLE : withUnit(comparison.metric, g.mean)} (n=${g.count})`)
      .join(' | ');
    const scope = comparison.within !== undefined ? `[${comparison.within}] ` : '';
    lines.push(chalk.dim(`  ${scope}${columnTitle(comparison.metric)} means: ${means}`));
    for (const delta of comparison.deltas) {
      lines.push(`${scope ? `  ${chalk.cyan(comparison.within)}` : ''}${describeDelta(comparison.metric, comparison.baseline, delta)}`);
    }
  }
  return lines;
}

export function reportToJson(report: Report): Record<string, unknown> {
  return {
    targets: report.rows.map(row => ({
      name: row.name,
      imageType: row.imageType,
      connectionPool: row.connectionPool,
      profile: row.profile,
      ...Object.fromEntries(report.metrics.map(metric => [metric, row[metric] ?? null])),
      warmCount: row.warmCount,
      ok: row.ok,
    })),
    rankings: report.rankings,
    groupBy: report.groupBy,
    within: report.within ?? null,
    baseline: report.baseline ?? null,
    comparisons: report.comparisons.map(c => ({
      metric: c.metric,
      ...(c.within !== undefined ? { within: c.within } : {}),
      baseline: c.baseline,
      groups: c.groups.map(g => ({ key: g.key, mean: g.mean ?? null, count: g.count })),
      deltas: c.deltas.map(d => ({ group: d.group, percent: d.percent ?? null, speedup: d.speedup ?? null })),
    })),
    failed: report.failed,
  };
}

function section(title: string): string {
  return `\n${chalk.yellow(title)}\n`;
}

/** The full report as printable text. Cells with no value show N/A. */
export function renderReport(report: Report, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(reportToJson(report), null, 2);
  }
  const table = formatList(rowCells(report), { format, columns: reportColumns(report) });
  if (format === 'csv') return table;

  const parts = [section('Performance Comparison'), table];
  const rankings = rankingLines(report);
  if (rankings.length > 0) {
    parts.push(section('🎯 Key Performance Insights'), ...rankings);
  }
  const comparisons = comparisonLines(report);
  if (comparisons.length > 0) {
    parts.push(section(`⚔️  Comparison by ${report.groupBy}${report.within ? ` within each ${report.within}` : ''} (baseline: ${report.baseline})`), ...comparisons);
  } else if (report.baseline !== undefined && !report.rows.some(r => r[report.groupBy] === report.baseline)) {
    parts.push('', chalk.dim(`  Baseline group "${report.baseline}" not found; no group comparison.`));
  }
  if (report.failed.length > 0) {
    parts.push('', chalk.red(`Some services failed: ${report.failed.map(displayName).join(', ')}`));
  }
  return parts.join('\n');
}
