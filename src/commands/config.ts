import { Command } from 'commander';
import chalk from 'chalk';
import { CONFIG_KEYS, getConfigPath, isConfigKey, resolveString, setConfigValue, unsetConfigValue } from '../config.js';
import { UsageError } from '../errors.js';
import { detectFormat, formatList, outputSingle } from '../output.js';
import type { GlobalOptions } from '../sources.js';

function supported(): string {
  return Object.keys(CONFIG_KEYS).join(', ');
}

export function register(program: Command): void {
  const cmd = program
    .command('config')
    .description('Manage CLI configuration');

  cmd
    .command('set <key> <value>')
    .description('Set a config value (e.g., runbench config set requests 20)')
    .action((key: string, value: string) => {
      setConfigValue(key, value);
      console.error(chalk.green(`${key} saved to ${getConfigPath()}`));
    });

  cmd
    .command('unset <key>')
    .description('Remove a config value so the default applies again')
    .action((key: string) => {
      unsetConfigValue(key);
      console.error(chalk.green(`${key} removed from ${getConfigPath()}`));
    });

  cmd
    .command('get <key>')
    .description('Print the effective value of a setting (flag > env > config file > default)')
    .action((key: string) => {
      if (!isConfigKey(key)) {
        throw new UsageError(`Unknown config key: ${key}. Supported: ${supported()}`);
      }
      const value = resolveString(key);
      if (value === undefined) {
        console.error(chalk.dim(`${key} is not set.`));
        return;
      }
      console.log(value);
    });

  cmd
    .command('list')
    .description('Show every setting with its effective value')
    .action(function (this: Command) {
      const format = detectFormat(this.optsWithGlobals<GlobalOptions>());
      const rows = Object.entries(CONFIG_KEYS).map(([key, spec]) => ({
        key,
        value: isConfigKey(key) ? resolveString(key) ?? '' : '',
        env: spec.env,
        description: spec.description,
      }));
      if (format === 'json') {
        outputSingle(Object.fromEntries(rows.map(r => [r.key, r.value])), { format });
        return;
      }
      console.log(formatList(rows, { format, columns: ['key', 'value', 'env', 'description'] }));
    });

  cmd
    .command('path')
    .description('Print config file location')
    .action(() => {
      console.log(getConfigPath());
    });
}
