#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { registerInsightCommands } from './commands/insights';
import { registerLedgerCommands } from './commands/ledger';
import { registerStockCommands } from './commands/stock';

const program = new Command();

program
  .name('stock-monitor')
  .description('Raw material stock ledger: movements, status, shortages and alerts')
  .version('1.0.0');

registerStockCommands(program);
registerInsightCommands(program);
registerLedgerCommands(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
