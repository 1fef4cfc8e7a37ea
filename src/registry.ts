import { existsSync, readFileSync } from 'fs';
import { ConfigurationError, UsageError } from './errors.js';
import type { Outcome, Target, TargetEntry } from './types.js';
import { isRecord } from './values.js';

/** Services deployed by the demo's Terraform, in comparison order. */
export const DEFAULT_SERVICES: readonly string[] = [
  'jvm-cloud-sql',
  'jvm-cloud-sql-pgbouncer',
  'native-cloud-sql',
  'native-cloud-sql-pgbouncer',
];

export interface ResolvedTargets {
  targets: Target[];
  errors: ConfigurationError[];
}

export function outputKey(name: string): string {
  return `${name.replace(/-/g, '_')}_url`;
}

/** Base URLs take appended endpoint paths: no query string or fragment. */
function normalizeUrl(raw: string): Outcome<string, string> {
  let parsed: URL;
  try {
    parsed = new URL(raw.trim());
  } catch {
    return { ok: false, error: `invalid URL "${raw}"` };
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return { ok: false, error: `invalid URL "${raw}"` };
  }
  if (parsed.search || parsed.hash) {
    return { ok: false, error: `URL "${raw}" must not have a query string or fragment` };
  }
  return { ok: true, value: `${parsed.origin}${parsed.pathname}`.replace(/\/+$/, '') };
}

/**
 * Turns entries into targets, looking up missing URLs in the deployment outputs.
 * Unresolvable entries are reported, not thrown, and dropped from the list.
 */
export function resolveTargets(entries: TargetEntry[], outputs: Record<string, string> = {}): ResolvedTargets {
  const targets: Target[] = [];
  const errors: ConfigurationError[] = [];
  const seen = new Set<string>();

  for (const entry of entries) {
    const name = entry.name.trim();
    if (!name) {
      errors.push(new ConfigurationError('(unnamed)', 'target has no name'));
      continue;
    }
    if (seen.has(name)) {
      errors.push(new ConfigurationError(name, 'duplicate target name'));
      continue;
    }
    seen.add(name);

    const key = outputKey(name);
    const raw = entry.url || outputs[key];
    if (!raw) {
      errors.push(new ConfigurationError(name, `no URL given and ${key} not found in deployment outputs`));
      continue;
    }
    const url = normalizeUrl(raw);
    if (!url.ok) {
      errors.push(new ConfigurationError(name, url.error));
      continue;
    }
    targets.push({ name, url: url.value });
  }

  return { targets, errors };
}

/** Keeps targets whose name contains any filter; each filter must match at least one target. */
export function filterTargets(targets: Target[], filters: string[]): ResolvedTargets {
  if (filters.length === 0) return { targets, errors: [] };

  const needles = filters.map(f => f.toLowerCase());
  const errors: ConfigurationError[] = [];
  for (let i = 0; i < needles.length; i++) {
    if (!targets.some(t => t.name.toLowerCase().includes(needles[i]))) {
      errors.push(new ConfigurationError(filters[i], 'filter matches no configured target'));
    }
  }
  return {
    targets: targets.filter(t => needles.some(n => t.name.toLowerCase().includes(n))),
    errors,
  };
}

/** Parses a `name=url` pair from --target. */
export function parseTargetFlag(value: string): TargetEntry {
  const eq = value.indexOf('=');
  if (eq <= 0) {
    throw new UsageError(`Invalid --target "${value}". Expected name=url`);
  }
  return { name: value.slice(0, eq).trim(), url: value.slice(eq + 1).trim() };
}

function readJson(path: string, what: string): unknown {
  if (!existsSync(path)) {
    throw new UsageError(`${what} not found: ${path}`);
  }
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new UsageError(`${what} is not valid JSON (${path}): ${detail}`);
  }
}

export function parseTargetEntries(data: unknown): TargetEntry[] {
  const list = Array.isArray(data) ? data : isRecord(data) ? data.targets : undefined;
  if (!Array.isArray(list)) {
    throw new UsageError('Targets file must be an array or an object with a "targets" array');
  }
  const items: unknown[] = list;
  return items.map((item, i) => {
    if (typeof item === 'string') return { name: item };
    if (!isRecord(item) || typeof item.name !== 'string') {
      throw new UsageError(`Targets file entry ${i} must have a string "name"`);
    }
    const entry: TargetEntry = { name: item.name };
    if (typeof item.url === 'string') entry.url = item.url;
    return entry;
  });
}

/** Accepts both `terraform output -json` (`{ key: { value } }`) and a flat `{ key: value }` map. */
export function parseOutputs(data: unknown): Record<string, string> {
  if (!isRecord(data)) {
    throw new UsageError('Outputs file must be a JSON object');
  }
  const outputs: Record<string, string> = {};
  for (const [key, raw] of Object.entries(data)) {
    const value = isRecord(raw) ? raw.value : raw;
    if (typeof value === 'string' && value !== '') {
      outputs[key] = value;
    }
  }
  return outputs;
}

export function loadTargetsFile(path: string): TargetEntry[] {
  return parseTargetEntries(readJson(path, 'Targets file'));
}

export function loadOutputsFile(path: string): Record<string, string> {
  return parseOutputs(readJson(path, 'Outputs file'));
}
