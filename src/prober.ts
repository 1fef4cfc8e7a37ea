import { BenchClient, describeFailure, joinUrl, type TimedResponse } from './client.js';
import { ProbeError, UsageError } from './errors.js';
import { mean } from './aggregate.js';
import type { LatencySample, Outcome, Target } from './types.js';

export interface ProbeOptions {
  path: string;
  timeoutMs: number;
  /** Pause between consecutive requests; none before the first. */
  delayMs?: number;
}

export interface LatencySummary {
  cold: number | undefined;
  warmMean: number | undefined;
  warmCount: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sends `requestCount` sequential GETs to the target's workload path.
 * The first failure ends the sequence and discards every sample taken so far.
 */
export async function probe(
  client: BenchClient,
  target: Target,
  requestCount: number,
  options: ProbeOptions
): Promise<Outcome<LatencySample[], ProbeError>> {
  if (!Number.isInteger(requestCount) || requestCount <= 0) {
    throw new UsageError(`Request count must be a positive integer, got ${requestCount}`);
  }

  const url = joinUrl(target.url, options.path);
  const samples: LatencySample[] = [];

  for (let index = 0; index < requestCount; index++) {
    if (index > 0 && options.delayMs) {
      await sleep(options.delayMs);
    }

    let response: TimedResponse;
    try {
      response = await client.get(url, options.timeoutMs);
    } catch (err) {
      return { ok: false, error: new ProbeError(target.name, index + 1, describeFailure(err)) };
    }
    if (!response.ok) {
      return { ok: false, error: new ProbeError(target.name, index + 1, 'non-success status', response.status) };
    }

    samples.push({ target: target.name, index, duration: response.durationSeconds });
  }

  return { ok: true, value: samples };
}

/** Sample 0 is the cold request; the warm mean covers everything after it. */
export function summarizeLatency(samples: LatencySample[]): LatencySummary {
  const ordered = [...samples].sort((a, b) => a.index - b.index);
  const cold = ordered.find(s => s.index === 0);
  const warm = ordered.filter(s => s.index > 0).map(s => s.duration);
  return {
    cold: cold?.duration,
    warmMean: mean(warm),
    warmCount: warm.length,
  };
}
