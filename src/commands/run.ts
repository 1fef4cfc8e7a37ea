import { Command } from 'commander';
import chalk from 'chalk';
import { BenchClient } from '../client.js';
import { isDebug, resolveNumber, resolveString } from '../config.js';
import { UsageError } from '../errors.js';
import { detectFormat } from '../output.js';
import { buildReport, renderReport, type NumericMetric } from '../report.js';
import { exitCodeFor, failedTargets, runBenchmark } from '../runner.js';
import { collectTargets, type GlobalOptions } from '../sources.js';
import type { CategoryField } from '../types.js';

export type RunMode = 'full' | 'metrics' | 'probe';

export interface RunCommandOptions extends GlobalOptions {
  requests?: string;
  timeout?: string;
  metricsTimeout?: string;
  path?: string;
  delay?: string;
  groupBy?: string;
  within?: string;
  baseline?: string;
}

const GROUP_FIELDS: readonly CategoryField[] = ['imageType', 'connectionPool', 'profile'];

const MODE_METRICS: Record<RunMode, NumericMetric[]> = {
  full: ['startupSeconds', 'memoryMB', 'responseSeconds', 'coldSeconds', 'warmSeconds'],
  metrics: ['startupSeconds', 'memoryMB', 'responseSeconds'],
  probe: ['coldSeconds', 'warmSeconds'],
};

function parseCategory(flag: string, value: string): CategoryField {
  const field = GROUP_FIELDS.find(f => f === value);
  if (!field) {
    throw new UsageError(`Invalid ${flag} "${value}". Supported: ${GROUP_FIELDS.join(', ')}`);
  }
  return field;
}

export function groupingOptions(opts: RunCommandOptions): { groupBy: CategoryField; within?: CategoryField } {
  const groupBy = opts.groupBy === undefined ? 'imageType' : parseCategory('--group-by', opts.groupBy);
  if (opts.within === undefined) return { groupBy };
  const within = parseCategory('--within', opts.within);
  if (within === groupBy) {
    throw new UsageError(`--within must differ from --group-by (both are ${groupBy})`);
  }
  return { groupBy, within };
}

/** Measures the selected targets and prints the report; resolves with the process exit code. */
export async function runComparison(mode: RunMode, filters: string[], opts: RunCommandOptions): Promise<number> {
  const format = detectFormat(opts);
  const { groupBy, within } = groupingOptions(opts);
  const probeMode = mode === 'probe';

  // The probe-only comparison keeps its own lighter defaults.
  const requestCount = resolveNumber('requests', opts.requests, probeMode ? 3 : undefined);
  const path = resolveString('probe-path', opts.path, probeMode ? 'metrics/startup' : undefined) ?? 'messages';
  const delayMs = resolveNumber('delay', opts.delay, probeMode ? 500 : undefined);
  const timeoutMs = resolveNumber('timeout', opts.timeout) * 1000;
  const metricsTimeoutMs = resolveNumber('metrics-timeout', opts.metricsTimeout) * 1000;

  const { targets, errors } = collectTargets(opts, filters);
  if (targets.length === 0 && errors.length === 0) {
    throw new UsageError('No targets to compare');
  }

  console.error(chalk.dim(`Comparing ${targets.length} service(s)${mode !== 'metrics' ? `, ${requestCount} request(s) each` : ''}`));

  const client = new BenchClient({ debug: isDebug(opts.debug) });
  const run = await runBenchmark(client, targets, errors, {
    collectMetrics: mode !== 'probe',
    probeLatency: mode !== 'metrics',
    requestCount,
    metricsTimeoutMs,
    probe: { path, timeoutMs, delayMs },
    progress: line => console.error(line),
  });

  const report = buildReport(run, {
    metrics: MODE_METRICS[mode],
    groupBy,
    within,
    baseline: opts.baseline,
    // Without metrics the categories come from the service names.
    inferCategories: probeMode,
    failed: failedTargets(run),
  });
  console.log(renderReport(report, format));

  return exitCodeFor(run);
}

export function register(program: Command): void {
  program
    .command('run [filters...]')
    .description('Collect metrics, probe cold and warm latency, and compare the services')
    .option('-r, --requests <n>', 'Probe requests per service (default: 10)')
    .option('--path <path>', 'Workload path to probe (default: messages)')
    .option('--delay <ms>', 'Pause between probe requests')
    .option('--timeout <seconds>', 'Per-request probe timeout')
    .option('--metrics-timeout <seconds>', 'Metrics request timeout')
    .option('--group-by <field>', `Compare groups by ${GROUP_FIELDS.join(' | ')}`, 'imageType')
    .option('--within <field>', 'Compare --group-by groups separately inside each value of this field')
    .option('--baseline <group>', 'Group the others are compared against (default: first seen)')
    .action(async (filters: string[], _options: unknown, command: Command) => {
      process.exitCode = await runComparison('full', filters, command.optsWithGlobals<RunCommandOptions>());
    });
}
