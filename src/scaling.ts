import { execFile } from 'child_process';
import { CommandError, UsageError } from './errors.js';

export type Scaling =
  | { mode: 'manual'; instances: number }
  | { mode: 'auto'; min: number; max: number };

/** Cloud Run service names behind the default targets. */
export const DEFAULT_CLOUD_RUN_SERVICES: readonly string[] = [
  'hello-cloud-run-jvm-cloud-sql',
  'native-hello-cloud-run-cloud-sql',
  'hello-cloud-run-jvm-cloud-sql-pgbouncer',
  'native-hello-cloud-run-cloud-sql-pgbouncer',
];

/** `3` pins exactly three instances; `1-5` autoscales between one and five. */
export function parseScaling(value: string): Scaling {
  const match = /^(\d+)(?:-(\d+))?$/.exec(value.trim());
  if (!match) {
    throw new UsageError(`Invalid scaling value '${value}'. Must be a number or range (e.g., 0, 1, 1-5, 0-100)`);
  }
  const first = Number(match[1]);
  if (match[2] === undefined) {
    return { mode: 'manual', instances: first };
  }
  const second = Number(match[2]);
  if (first > second) {
    throw new UsageError(`Invalid scaling range '${value}': minimum exceeds maximum`);
  }
  return { mode: 'auto', min: first, max: second };
}

export function describeScaling(scaling: Scaling): string {
  return scaling.mode === 'manual'
    ? `manual, exactly ${scaling.instances} instance${scaling.instances === 1 ? '' : 's'}`
    : `automatic, ${scaling.min}-${scaling.max} instances`;
}

export interface ScaleTarget {
  project: string;
  region: string;
}

export function buildUpdateArgs(service: string, scaling: Scaling, where: ScaleTarget): string[] {
  const args = ['beta', 'run', 'services', 'update', service];
  if (scaling.mode === 'manual') {
    args.push(`--scaling=${scaling.instances}`);
  } else {
    args.push('--scaling=auto', `--min-instances=${scaling.min}`, `--max-instances=${scaling.max}`);
  }
  args.push(`--project=${where.project}`, `--region=${where.region}`, '--quiet');
  return args;
}

/** Runs an external command and resolves with its stdout. */
export type CommandRunner = (command: string, args: string[]) => Promise<string>;

export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    execFile(command, args, { timeout: 120_000 }, (err, stdout, stderr) => {
      if (err) {
        const detail = String(stderr).trim() || err.message;
        reject(new CommandError(`${command} ${args.slice(0, 5).join(' ')}`, detail));
        return;
      }
      resolve(String(stdout));
    });
  });

export interface ScaleOutcome {
  service: string;
  ok: boolean;
  error?: string;
}

/** Updates each service in turn; a failure is recorded and the next service is still tried. */
export async function scaleServices(
  services: readonly string[],
  scaling: Scaling,
  where: ScaleTarget,
  runner: CommandRunner = runCommand,
  onResult: (outcome: ScaleOutcome) => void = () => undefined
): Promise<ScaleOutcome[]> {
  const outcomes: ScaleOutcome[] = [];
  for (const service of services) {
    let outcome: ScaleOutcome;
    try {
      await runner('gcloud', buildUpdateArgs(service, scaling, where));
      outcome = { service, ok: true };
    } catch (err) {
      outcome = { service, ok: false, error: err instanceof Error ? err.message : String(err) };
    }
    outcomes.push(outcome);
    onResult(outcome);
  }
  return outcomes;
}

const DESCRIBE_FORMAT = 'value('
  + "metadata.annotations['run.googleapis.com/scalingMode'],"
  + "metadata.annotations['run.googleapis.com/manualInstanceCount'],"
  + "spec.template.metadata.annotations['autoscaling.knative.dev/minScale'],"
  + "spec.template.metadata.annotations['autoscaling.knative.dev/maxScale'])";

export function buildDescribeArgs(service: string, where: ScaleTarget): string[] {
  return [
    'run', 'services', 'describe', service,
    `--project=${where.project}`, `--region=${where.region}`,
    `--format=${DESCRIBE_FORMAT}`,
  ];
}

export interface ScalingStatus {
  mode: string;
  manualInstances?: string;
  minScale: string;
  maxScale: string;
}

/** Parses the tab-separated `describe` output; empty fields fall back to Cloud Run's defaults. */
export function parseScalingStatus(output: string): ScalingStatus | undefined {
  const line = output.replace(/^[\r\n]+|[\r\n]+$/g, '');
  if (!line.trim()) return undefined;
  const [mode = '', manual = '', min = '', max = ''] = line.split('\t').map(f => f.trim());
  const status: ScalingStatus = {
    mode: mode || 'automatic',
    minScale: min || '0',
    maxScale: max || '100',
  };
  if (status.mode === 'manual' && manual) status.manualInstances = manual;
  return status;
}

export interface VerifyOutcome {
  service: string;
  status?: ScalingStatus;
  error?: string;
}

/** Reads back each service's scaling settings after an update. */
export async function verifyScaling(
  services: readonly string[],
  where: ScaleTarget,
  runner: CommandRunner = runCommand,
  onResult: (outcome: VerifyOutcome) => void = () => undefined
): Promise<VerifyOutcome[]> {
  const outcomes: VerifyOutcome[] = [];
  for (const service of services) {
    let outcome: VerifyOutcome;
    try {
      const status = parseScalingStatus(await runner('gcloud', buildDescribeArgs(service, where)));
      outcome = status ? { service, status } : { service, error: 'no scaling information returned' };
    } catch (err) {
      outcome = { service, error: err instanceof Error ? err.message : String(err) };
    }
    outcomes.push(outcome);
    onResult(outcome);
  }
  return outcomes;
}
