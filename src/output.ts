import chalk from 'chalk';
import Table from 'cli-table3';
import { createInterface } from 'readline';
import type { OutputOptions } from './types.js';

export type OutputFormat = 'json' | 'table' | 'csv';

export function detectFormat(opts: OutputOptions): OutputFormat {
  if (opts.json) return 'json';
  if (opts.csv) return 'csv';
  if (opts.table) return 'table';
  return process.stdout.isTTY ? 'table' : 'json';
}

function csvCell(value: string): string {
  return value.includes(',') || value.includes('"') || value.includes('\n') ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Renders rows as CSV or as a table; JSON callers serialize their own structures. */
export function formatList(items: Record<string, string>[], opts: {
  format: Exclude<OutputFormat, 'json'>;
  columns?: string[];
}): string {
  if (items.length === 0) {
    return opts.format === 'table' ? chalk.dim('No results.') : '';
  }

  const columns = opts.columns || Object.keys(items[0]);

  if (opts.format === 'csv') {
    const lines = [columns.map(csvCell).join(',')];
    for (const row of items) {
      lines.push(columns.map(c => csvCell(row[c] ?? '')).join(','));
    }
    return lines.join('\n');
  }

  const table = new Table({
    head: columns.map(c => chalk.cyan(c)),
    style: { head: [], border: [] },
    wordWrap: true,
  });
  for (const row of items) {
    table.push(columns.map(c => {
      const v = row[c] ?? '';
      return v.length > 60 ? v.slice(0, 57) + '...' : v;
    }));
  }
  return table.toString();
}

export function outputSingle(item: Record<string, string>, opts: { format: OutputFormat }): void {
  if (opts.format === 'json') {
    console.log(JSON.stringify(item, null, 2));
    return;
  }
  if (opts.format === 'csv') {
    console.log(formatList([item], { format: 'csv' }));
    return;
  }
  // table format: key-value pairs
  const table = new Table({ style: { head: [], border: [] } });
  for (const [key, value] of Object.entries(item)) {
    table.push({ [chalk.cyan(key)]: value.length > 80 ? value.slice(0, 77) + '...' : value });
  }
  console.log(table.toString());
}

export async function confirm(message: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  return new Promise(resolve => {
    rl.question(`${message} [y/N] `, answer => {
      rl.close();
      resolve(answer.trim().toLowerCase() === 'y');
    });
  });
}
