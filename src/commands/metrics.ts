import { Command } from 'commander';
import { runComparison, type RunCommandOptions } from './run.js';

export function register(program: Command): void {
  program
    .command('metrics [filters...]')
    .description('Compare startup time and memory from each service\'s /metrics endpoint (no probing)')
    .option('--metrics-timeout <seconds>', 'Metrics request timeout')
    .option('--group-by <field>', 'Compare groups by imageType | connectionPool | profile', 'imageType')
    .option('--within <field>', 'Compare --group-by groups separately inside each value of this field')
    .option('--baseline <group>', 'Group the others are compared against')
    .action(async (filters: string[], _options: unknown, command: Command) => {
      process.exitCode = await runComparison('metrics', filters, command.optsWithGlobals<RunCommandOptions>());
    });
}
