import type { AggregateResult } from './types.js';

export function mean(values: number[]): number | undefined {
  if (values.length === 0) return undefined;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

/**
 * (baseline - candidate) / baseline * 100. Positive means the candidate is
 * faster or smaller. Undefined when the baseline is zero or a side is missing.
 */
export function percentDelta(baseline: number | undefined, candidate: number | undefined): number | undefined {
  if (baseline === undefined || candidate === undefined || baseline === 0) return undefined;
  return ((baseline - candidate) / baseline) * 100;
}

/** How many times larger the baseline is than the candidate. */
export function speedup(baseline: number | undefined, candidate: number | undefined): number | undefined {
  if (baseline === undefined || candidate === undefined || candidate === 0) return undefined;
  return baseline / candidate;
}

/**
 * Partitions rows by a categorical key, in first-seen order, and averages the
 * defined values of `metric` in each group. `count` counts defined values only.
 */
export function groupMeans<Row>(
  rows: readonly Row[],
  key: (row: Row) => string,
  metric: (row: Row) => number | undefined
): AggregateResult[] {
  const groups = new Map<string, number[]>();
  for (const row of rows) {
    const k = key(row);
    let values = groups.get(k);
    if (!values) {
      values = [];
      groups.set(k, values);
    }
    const value = metric(row);
    if (value !== undefined) values.push(value);
  }
  return [...groups.entries()].map(([k, values]) => ({ key: k, mean: mean(values), count: values.length }));
}

export interface Extreme<Row> {
  row: Row;
  value: number;
}

export interface Ranking<Row> {
  min: Extreme<Row>;
  max: Extreme<Row>;
}

/** Min and max over rows with a defined value; ties go to the earliest row. */
export function rank<Row>(rows: readonly Row[], metric: (row: Row) => number | undefined): Ranking<Row> | undefined {
  let min: Extreme<Row> | undefined;
  let max: Extreme<Row> | undefined;
  for (const row of rows) {
    const value = metric(row);
    if (value === undefined) continue;
    if (!min || value < min.value) min = { row, value };
    if (!max || value > max.value) max = { row, value };
  }
  return min && max ? { min, max } : undefined;
}
