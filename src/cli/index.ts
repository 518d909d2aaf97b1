#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { registerAddCommand } from './commands/add.js';
import { registerIndexCommand } from './commands/index.js';
import { registerSearchCommand } from './commands/search.js';
import { registerFilterCommands } from './commands/filters.js';
import { registerOpenAlexCommands } from './commands/openalex.js';
import { registerReportCommands } from './commands/report.js';
import { registerHealthCommand } from './commands/health.js';
import { LitdbError } from '../domain/errors/DomainErrors.js';
import { reportError } from './commands/shared.js';

// 從 package.json 動態讀取版本號，避免硬編碼導致版本不同步
const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

const program = new Command();

program
  .name('litdb')
  .description('Personal literature database with vector and full-text search')
  .version(version);

registerAddCommand(program);
registerIndexCommand(program);
registerSearchCommand(program);
registerFilterCommands(program);
registerOpenAlexCommands(program);
registerReportCommands(program);
registerHealthCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }
    if (err instanceof LitdbError) {
      reportError(err);
      process.exit(1);
    }
    process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  }
}

void main();
