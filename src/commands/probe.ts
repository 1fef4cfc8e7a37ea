import { Command } from 'commander';
import { runComparison, type RunCommandOptions } from './run.js';

export function register(program: Command): void {
  program
    .command('probe [filters...]')
    .description('Compare cold (first request) and warm latency without reading metrics')
    .option('-r, --requests <n>', 'Requests per service (default: 3)')
    .option('--path <path>', 'Path to probe (default: metrics/startup)')
    .option('--delay <ms>', 'Pause between requests (default: 500)')
    .option('--timeout <seconds>', 'Per-request timeout')
    .option('--group-by <field>', 'Compare groups by imageType | connectionPool (read from service names)', 'imageType')
    .option('--within <field>', 'Compare --group-by groups separately inside each value of this field')
    .option('--baseline <group>', 'Group the others are compared against')
    .action(async (filters: string[], _options: unknown, command: Command) => {
      process.exitCode = await runComparison('probe', filters, command.optsWithGlobals<RunCommandOptions>());
    });
}
