import chalk from 'chalk';

export class ConfigurationError extends Error {
  constructor(
    public target: string,
    public reason: string
  ) {
    super(`Target ${target}: ${reason}`);
  }

  display(): string {
    return chalk.yellow(`⚠️  Skipping ${chalk.cyan(this.target)} (${this.reason})`);
  }

  get exitCode(): number { return 1; }
}

export class FetchError extends Error {
  constructor(
    public target: string,
    public detail: string,
    public statusCode?: number
  ) {
    super(`Failed to collect metrics from ${target}: ${detail}`);
  }

  display(): string {
    const status = this.statusCode !== undefined ? ` (HTTP ${this.statusCode})` : '';
    return chalk.red(`❌ Failed to collect metrics from ${this.target}${status}: ${this.detail}`);
  }

  get exitCode(): number { return 1; }
}

export class ProbeError extends Error {
  constructor(
    public target: string,
    public request: number,
    public detail: string,
    public statusCode?: number
  ) {
    super(`Request ${request} to ${target} failed: ${detail}`);
  }

  display(): string {
    const status = this.statusCode !== undefined ? ` (HTTP ${this.statusCode})` : '';
    return chalk.red(`❌ Request ${this.request} failed${status}: ${this.detail} - no average calculated for ${this.target}`);
  }

  get exitCode(): number { return 1; }
}

export class UsageError extends Error {
  display(): string {
    return chalk.red(`Error: ${this.message}`);
  }

  get exitCode(): number { return 2; }
}

export class CommandError extends Error {
  constructor(
    public command: string,
    public detail: string
  ) {
    super(`${command} failed: ${detail}`);
  }

  display(): string {
    return [
      chalk.red(`Error: ${this.command} failed`),
      chalk.dim(`  ${this.detail}`),
    ].join('\n');
  }

  get exitCode(): number { return 1; }
}
