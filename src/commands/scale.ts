import { Command } from 'commander';
import chalk from 'chalk';
import { resolveString } from '../config.js';
import { UsageError } from '../errors.js';
import { confirm } from '../output.js';
import {
  DEFAULT_CLOUD_RUN_SERVICES,
  buildUpdateArgs,
  describeScaling,
  parseScaling,
  runCommand,
  scaleServices,
  verifyScaling,
  type CommandRunner,
  type VerifyOutcome,
} from '../scaling.js';
import { loadOutputsFile } from '../registry.js';
import type { GlobalOptions } from '../sources.js';

export interface ScaleCommandOptions extends GlobalOptions {
  service?: string[];
  project?: string;
  region?: string;
  dryRun?: boolean;
  yes?: boolean;
}

function printStatus(outcome: VerifyOutcome): void {
  console.error(`[${outcome.service}]:`);
  if (!outcome.status) {
    console.error(chalk.red(`  ❌ Could not retrieve scaling info: ${outcome.error}`));
    return;
  }
  console.error(`  Mode: ${outcome.status.mode}`);
  if (outcome.status.manualInstances !== undefined) {
    console.error(`  Manual Instance Count: ${outcome.status.manualInstances}`);
  }
  console.error(`  Min Scale: ${outcome.status.minScale}`);
  console.error(`  Max Scale: ${outcome.status.maxScale}`);
}

export async function scale(value: string, opts: ScaleCommandOptions, runner: CommandRunner = runCommand): Promise<number> {
  const scaling = parseScaling(value);
  // Deployment outputs name the project and region the services were deployed to.
  const outputsFile = resolveString('outputs-file', opts.outputs);
  const outputs = outputsFile ? loadOutputsFile(outputsFile) : {};
  const project = resolveString('project', opts.project ?? outputs.gcp_project_id);
  if (!project) {
    throw new UsageError('Could not determine project ID. Pass --project, add gcp_project_id to the outputs file, set GCP_PROJECT_ID or run: runbench config set project <id>');
  }
  const region = resolveString('region', opts.region ?? outputs.gcp_region) ?? 'asia-southeast1';
  const services = opts.service && opts.service.length > 0 ? opts.service : DEFAULT_CLOUD_RUN_SERVICES;
  const where = { project, region };

  console.error(chalk.bold(`Scaling ${services.length} service(s) in ${project}/${region}: ${describeScaling(scaling)}`));

  if (opts.dryRun) {
    for (const service of services) {
      console.log(['gcloud', ...buildUpdateArgs(service, scaling, where)].join(' '));
    }
    return 0;
  }

  if (scaling.mode === 'manual' && scaling.instances === 0 && !opts.yes) {
    if (!process.stdin.isTTY) {
      throw new UsageError('Scaling to 0 stops every instance. Pass --yes to confirm in non-interactive mode.');
    }
    if (!(await confirm('Scale all selected services to 0 instances?'))) {
      console.error(chalk.dim('Cancelled.'));
      return 0;
    }
  }

  const outcomes = await scaleServices(services, scaling, where, runner, outcome => {
    if (outcome.ok) {
      console.error(chalk.green(`✅ [${outcome.service}] Successfully updated`));
    } else {
      console.error(chalk.red(`❌ [${outcome.service}] Failed to update: ${outcome.error}`));
    }
  });

  console.error(chalk.bold('Verifying scaling configuration...'));
  await verifyScaling(services, where, runner, printStatus);

  const succeeded = outcomes.filter(o => o.ok).length;
  console.error(`${succeeded}/${outcomes.length} services updated`);
  return succeeded === outcomes.length ? 0 : 1;
}

export function register(program: Command): void {
  program
    .command('scale <value>')
    .description('Set instance scaling: N for exactly N instances (0 forces cold starts), MIN-MAX for autoscaling')
    .option('--service <name>', 'Cloud Run service to update (repeatable; default: the four demo services)', (v: string, p: string[]) => [...p, v], [] as string[])
    .option('--project <id>', 'Cloud project (default: gcp_project_id from --outputs, GCP_PROJECT_ID or config)')
    .option('--region <region>', 'Cloud region (default: gcp_region from --outputs, GCP_REGION, config, or asia-southeast1)')
    .option('--dry-run', 'Print the gcloud commands instead of running them')
    .option('-y, --yes', 'Skip confirmation when scaling to 0')
    .action(async (value: string, _options: unknown, command: Command) => {
      process.exitCode = await scale(value, command.optsWithGlobals<ScaleCommandOptions>());
    });
}
