import type { Command } from 'commander';
import { withRuntime } from '../runtime.js';
import { formatter, withCommonOptions, write } from './shared.js';
import type { CommonOptions } from './shared.js';

interface HealthCommandOptions extends CommonOptions {
  fix: boolean;
}

/** 註冊 health 指令 */
export function registerHealthCommand(program: Command): void {
  withCommonOptions(
    program
      .command('health')
      .description('Check that the vector and full-text indexes match the stored items')
      .option('--fix', 'Attempt to fix issues', false),
  ).action(async (opts: HealthCommandOptions) => {
    await withRuntime(opts, async (rt) => {
      const report = await rt.health.check({ fix: opts.fix });
      write(formatter.formatObject(report, opts.format));
      process.exitCode = report.healthy || opts.fix ? 0 : 1;
    });
  });
}
