import chalk from 'chalk';
import { BenchClient } from './client.js';
import { ConfigurationError } from './errors.js';
import { fetchMetrics, unavailableMetrics } from './metrics.js';
import { probe, summarizeLatency, type ProbeOptions } from './prober.js';
import type { RunResult, Target, TargetResult } from './types.js';
import { displayName, formatNumber } from './values.js';

export interface RunOptions {
  collectMetrics: boolean;
  probeLatency: boolean;
  requestCount: number;
  metricsTimeoutMs: number;
  probe: ProbeOptions;
  /** Receives human-readable progress lines. */
  progress?: (line: string) => void;
}

/**
 * Measures each target in turn: metrics first, then the latency probe.
 * Failures are recorded on the target's result and never stop the run.
 */
export async function runBenchmark(
  client: BenchClient,
  targets: Target[],
  configurationErrors: ConfigurationError[],
  options: RunOptions
): Promise<RunResult> {
  const progress = options.progress ?? (() => undefined);
  const results = new Map<string, TargetResult>();

  for (const error of configurationErrors) {
    progress(error.display());
  }

  for (const target of targets) {
    const result: TargetResult = { target, metrics: [], latency: [], errors: [] };
    results.set(target.name, result);
    progress(`🔍 ${chalk.cyan('Testing service:')} ${chalk.yellow(displayName(target.name))}`);

    if (options.collectMetrics) {
      const outcome = await fetchMetrics(client, target, options.metricsTimeoutMs);
      if (outcome.ok) {
        result.metrics = outcome.value.samples;
        result.metricsResponseSeconds = outcome.value.responseSeconds;
        const startup = result.metrics.find(s => s.field === 'startupTimeSeconds')?.value;
        const memory = result.metrics.find(s => s.field === 'memoryUsedMB')?.value;
        const image = result.metrics.find(s => s.field === 'imageType')?.value;
        progress(`  🎯 Response=${formatNumber(outcome.value.responseSeconds)}s | ⚡ App=${startup}s | 💾 Memory=${memory}MB | 🏗️  Image=${image}`);
      } else {
        result.metrics = unavailableMetrics(target.name);
        result.errors.push(outcome.error);
        progress(`  ${outcome.error.display()}`);
      }
    }

    if (options.probeLatency) {
      progress(`  ${chalk.yellow(`🔥 Probing /${options.probe.path.replace(/^\/+/, '')} (${options.requestCount} requests)...`)}`);
      const outcome = await probe(client, target, options.requestCount, options.probe);
      if (outcome.ok) {
        result.latency = outcome.value;
        const summary = summarizeLatency(outcome.value);
        progress(`  ❄️  Cold: ${formatNumber(summary.cold)}s | 🏆 Warm average: ${formatNumber(summary.warmMean)}s (${summary.warmCount} requests)`);
      } else {
        result.errors.push(outcome.error);
        progress(`  ${outcome.error.display()}`);
      }
    }
  }

  return { results, configurationErrors };
}

export function failedTargets(run: RunResult): string[] {
  const failed = run.configurationErrors.map(e => e.target);
  for (const [name, result] of run.results) {
    if (result.errors.length > 0) failed.push(name);
  }
  return failed;
}

export function exitCodeFor(run: RunResult): number {
  return failedTargets(run).length === 0 ? 0 : 1;
}
