import { UNAVAILABLE } from './types.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Numbers arrive as numbers or as formatted strings such as "1.234". */
export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value !== 'string' || value.trim() === '') return undefined;
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function formatNumber(value: number | undefined, digits = 3): string {
  return value === undefined ? UNAVAILABLE : value.toFixed(digits);
}

export function formatPercent(value: number): string {
  return `${Math.abs(value).toFixed(2)}%`;
}

/** `jvm_cloud_sql` and `jvm-cloud-sql` display the same. */
export function displayName(name: string): string {
  return name.replace(/_/g, '-');
}
