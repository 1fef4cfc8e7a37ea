import type { ConfigurationError, FetchError, ProbeError } from './errors.js';

export interface Target {
  readonly name: string;
  readonly url: string;
}

/** A target as listed in a targets file or on the command line, before its URL is resolved. */
export interface TargetEntry {
  name: string;
  url?: string;
}

export const UNAVAILABLE = 'N/A';

export type MetricField = 'startupTimeSeconds' | 'memoryUsedMB' | 'imageType' | 'connectionPool' | 'profile';
export type CategoryField = 'imageType' | 'connectionPool' | 'profile';

export interface MetricSample {
  readonly target: string;
  readonly field: MetricField;
  readonly value: number | string;
  readonly unit: string;
}

export interface MetricSnapshot {
  samples: MetricSample[];
  /** Wall-clock seconds the metrics call took. */
  responseSeconds: number;
}

export interface LatencySample {
  readonly target: string;
  readonly index: number;
  /** Seconds. */
  readonly duration: number;
}

export interface AggregateResult {
  key: string;
  mean: number | undefined;
  count: number;
}

export type Outcome<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type TargetError = ConfigurationError | FetchError | ProbeError;

export interface TargetResult {
  target: Target;
  metrics: MetricSample[];
  metricsResponseSeconds?: number;
  latency: LatencySample[];
  errors: TargetError[];
}

export interface RunResult {
  results: Map<string, TargetResult>;
  configurationErrors: ConfigurationError[];
}

export interface OutputOptions {
  json?: boolean;
  table?: boolean;
  csv?: boolean;
}
