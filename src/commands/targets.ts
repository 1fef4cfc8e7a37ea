import { Command } from 'commander';
import { detectFormat, formatList } from '../output.js';
import { collectTargets, type GlobalOptions } from '../sources.js';
import { displayName } from '../values.js';

export function register(program: Command): void {
  program
    .command('targets [filters...]')
    .description('List the services a run would compare, with their resolved URLs')
    .action(function (this: Command, filters: string[]) {
      const opts = this.optsWithGlobals<GlobalOptions>();
      const format = detectFormat(opts);
      const { targets, errors } = collectTargets(opts, filters);

      for (const error of errors) {
        console.error(error.display());
      }

      if (format === 'json') {
        console.log(JSON.stringify({
          targets,
          errors: errors.map(e => ({ target: e.target, reason: e.reason })),
        }, null, 2));
      } else {
        const rows = targets.map(t => ({ name: displayName(t.name), url: t.url }));
        console.log(formatList(rows, { format, columns: ['name', 'url'] }));
      }

      if (errors.length > 0) process.exitCode = 1;
    });
}
