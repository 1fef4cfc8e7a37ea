import { resolveString } from './config.js';
import { UsageError } from './errors.js';
import {
  DEFAULT_SERVICES,
  filterTargets,
  loadOutputsFile,
  loadTargetsFile,
  parseTargetFlag,
  resolveTargets,
  type ResolvedTargets,
} from './registry.js';
import type { OutputOptions, TargetEntry } from './types.js';

export interface GlobalOptions extends OutputOptions {
  debug?: boolean;
  targets?: string;
  outputs?: string;
  target?: string[];
}

/**
 * Builds the run's target list. Entries come from --target flags, else the
 * targets file, else the default services; URLs missing from entries are read
 * from the deployment outputs file.
 */
export function collectTargets(opts: GlobalOptions, filters: string[] = []): ResolvedTargets {
  const targetsFile = resolveString('targets-file', opts.targets);
  const outputsFile = resolveString('outputs-file', opts.outputs);

  let entries: TargetEntry[];
  if (opts.target && opts.target.length > 0) {
    entries = opts.target.map(parseTargetFlag);
  } else if (targetsFile) {
    entries = loadTargetsFile(targetsFile);
  } else if (outputsFile) {
    entries = DEFAULT_SERVICES.map(name => ({ name }));
  } else {
    throw new UsageError('No targets configured. Use --target name=url, --targets <file> or --outputs <file>');
  }

  const outputs = outputsFile ? loadOutputsFile(outputsFile) : {};
  const resolved = resolveTargets(entries, outputs);
  const filtered = filterTargets(resolved.targets, filters);
  return {
    targets: filtered.targets,
    errors: [...resolved.errors, ...filtered.errors],
  };
}
