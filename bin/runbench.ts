#!/usr/bin/env node
import { program } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { CommandError, ConfigurationError, FetchError, ProbeError, UsageError } from '../src/errors.js';
import { isDebug } from '../src/config.js';

import { register as registerRun } from '../src/commands/run.js';
import { register as registerMetrics } from '../src/commands/metrics.js';
import { register as registerProbe } from '../src/commands/probe.js';
import { register as registerTargets } from '../src/commands/targets.js';
import { register as registerScale } from '../src/commands/scale.js';
import { register as registerConfig } from '../src/commands/config.js';

function loadCliVersion(): string {
  try {
    const here = dirname(fileURLToPath(import.meta.url));
    const packageJson: unknown = JSON.parse(readFileSync(join(here, '..', 'package.json'), 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
      && typeof packageJson.version === 'string' && packageJson.version.length > 0) {
      return packageJson.version;
    }
  } catch {
    // Fall through to static default.
  }
  return '0.1.0';
}

type KnownError = UsageError | CommandError | ConfigurationError | FetchError | ProbeError;

function isKnownError(err: unknown): err is KnownError {
  return err instanceof UsageError || err instanceof CommandError || err instanceof ConfigurationError
    || err instanceof FetchError || err instanceof ProbeError;
}

// Global error handler
function handleError(err: unknown): never {
  const jsonMode = program.opts().json || !process.stdout.isTTY;

  if (isKnownError(err)) {
    if (jsonMode) {
      console.error(JSON.stringify({ error: true, type: err.constructor.name, message: err.message }));
    } else {
      console.error(err.display());
    }
    process.exit(err.exitCode);
  }
  if (err instanceof Error) {
    if (jsonMode) {
      console.error(JSON.stringify({ error: true, type: 'unknown_error', message: err.message }));
    } else {
      console.error(chalk.red(`Error: ${err.message}`));
      if (isDebug(program.opts().debug)) {
        console.error(err.stack);
      }
    }
  } else {
    if (jsonMode) {
      console.error(JSON.stringify({ error: true, type: 'unknown_error', message: 'An unexpected error occurred' }));
    } else {
      console.error(chalk.red('An unexpected error occurred'));
    }
  }
  process.exit(1);
}

program
  .name('runbench')
  .version(loadCliVersion())
  .description('Compare startup time, memory and cold/warm latency across deployed service variants.')
  .option('--targets <file>', 'JSON file listing targets ({ "targets": [{ "name", "url" }] })')
  .option('--outputs <file>', 'terraform output -json file; supplies <name>_url for targets without a URL')
  .option('--target <name=url>', 'Target to compare (repeatable; overrides --targets)', (v: string, p: string[]) => [...p, v], [] as string[])
  .option('--json', 'Force JSON output')
  .option('--table', 'Force table output')
  .option('--csv', 'Force CSV output')
  .option('--no-color', 'Disable colors')
  .option('--debug', 'Print each request and response to stderr');

if (process.argv.includes('--no-color')) {
  process.env.NO_COLOR = '1';
}

registerRun(program);
registerMetrics(program);
registerProbe(program);
registerTargets(program);
registerScale(program);
registerConfig(program);

program.parseAsync(process.argv).catch(handleError);

process.on('uncaughtException', handleError);
process.on('unhandledRejection', handleError);
