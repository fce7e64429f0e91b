/**
 * Output formatting utilities for the CLI
 */

import chalk from 'chalk';
import type { StockStatus } from '../domains/stock/types';

export function heading(text: string): void {
  console.log(chalk.bold.cyan(`\n${text}`));
  console.log(chalk.dim('─'.repeat(Math.min(text.length + 4, 60))));
}

export function field(label: string, value: string | number | null | undefined): void {
  const display = value === null || value === undefined ? chalk.dim('—') : String(value);
  console.log(`  ${chalk.gray(label.padEnd(18))} ${display}`);
}

export function success(text: string): void {
  console.log(chalk.green(`✓ ${text}`));
}

export function error(text: string): void {
  console.error(chalk.red(`✗ ${text}`));
}

export function warn(text: string): void {
  console.log(chalk.yellow(`! ${text}`));
}

export function colorStatus(status: StockStatus): string {
  switch (status) {
    case 'CRITICAL':
      return chalk.red(status);
    case 'WARNING':
      return chalk.yellow(status);
    case 'NORMAL':
      return chalk.green(status);
  }
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export type TableRow = Record<string, string | number | null | undefined>;

// Widths are measured on the raw text so colored cells line up.
export function formatTable(rows: TableRow[], columns?: string[]): string[] {
  if (rows.length === 0) {
    return [chalk.dim('  No results')];
  }

  const cols = columns ?? Object.keys(rows[0]);
  const cell = (row: TableRow, col: string) => {
    const value = row[col];
    return value === null || value === undefined ? '' : String(value);
  };
  const visibleLength = (text: string) => stripAnsi(text).length;
  const widths = cols.map((c) => Math.max(c.length, ...rows.map((r) => visibleLength(cell(r, c)))));
  const pad = (text: string, width: number) => text + ' '.repeat(Math.max(0, width - visibleLength(text)));

  const lines = [
    chalk.bold(`  ${cols.map((c, i) => pad(c, widths[i])).join('  ')}`),
    chalk.dim(`  ${widths.map((w) => '─'.repeat(w)).join('──')}`)
  ];
  for (const row of rows) {
    lines.push(`  ${cols.map((c, i) => pad(cell(row, c), widths[i])).join('  ')}`);
  }
  return lines;
}

export function table(rows: TableRow[], columns?: string[]): void {
  for (const line of formatTable(rows, columns)) {
    console.log(line);
  }
}

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}
