import { BenchClient, describeFailure, joinUrl, type TimedResponse } from './client.js';
import { FetchError } from './errors.js';
import { UNAVAILABLE } from './types.js';
import type { MetricField, MetricSample, MetricSnapshot, Outcome, Target } from './types.js';
import { isRecord, toNumber } from './values.js';

interface FieldSpec {
  field: MetricField;
  path: readonly string[];
  numeric: boolean;
  unit: string;
}

export const METRIC_FIELDS: readonly FieldSpec[] = [
  { field: 'startupTimeSeconds', path: ['startupTimeSeconds'], numeric: true, unit: 's' },
  { field: 'memoryUsedMB', path: ['memory', 'usedMB'], numeric: true, unit: 'MB' },
  { field: 'imageType', path: ['imageType'], numeric: false, unit: '' },
  { field: 'connectionPool', path: ['connectionPool'], numeric: false, unit: '' },
  { field: 'profile', path: ['profile'], numeric: false, unit: '' },
];

const DEFAULT_METRICS_TIMEOUT_MS = 60_000;

function lookup(payload: Record<string, unknown>, path: readonly string[]): unknown {
  let node: unknown = payload;
  for (const segment of path) {
    if (!isRecord(node)) return undefined;
    node = node[segment];
  }
  return node;
}

export function extractMetrics(target: string, payload: Record<string, unknown>): MetricSample[] {
  return METRIC_FIELDS.map(spec => {
    const raw = lookup(payload, spec.path);
    let value: number | string = UNAVAILABLE;
    if (spec.numeric) {
      value = toNumber(raw) ?? UNAVAILABLE;
    } else if (typeof raw === 'string' && raw !== '') {
      value = raw;
    }
    return { target, field: spec.field, value, unit: spec.unit };
  });
}

export function unavailableMetrics(target: string): MetricSample[] {
  return METRIC_FIELDS.map(spec => ({ target, field: spec.field, value: UNAVAILABLE, unit: spec.unit }));
}

export async function fetchMetrics(
  client: BenchClient,
  target: Target,
  timeoutMs: number = DEFAULT_METRICS_TIMEOUT_MS
): Promise<Outcome<MetricSnapshot, FetchError>> {
  let response: TimedResponse;
  try {
    response = await client.get(joinUrl(target.url, 'metrics'), timeoutMs);
  } catch (err) {
    return { ok: false, error: new FetchError(target.name, describeFailure(err)) };
  }

  if (!response.ok) {
    return { ok: false, error: new FetchError(target.name, 'metrics endpoint returned an error', response.status) };
  }

  let payload: unknown;
  try {
    payload = JSON.parse(response.body);
  } catch {
    return { ok: false, error: new FetchError(target.name, 'response is not valid JSON', response.status) };
  }
  if (!isRecord(payload)) {
    return { ok: false, error: new FetchError(target.name, 'response is not a JSON object', response.status) };
  }

  return {
    ok: true,
    value: {
      samples: extractMetrics(target.name, payload),
      responseSeconds: response.durationSeconds,
    },
  };
}
