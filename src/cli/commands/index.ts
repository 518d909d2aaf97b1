import type { Command } from 'commander';
import { withRuntime } from '../runtime.js';
import { abortOnInterrupt, formatter, forEachInput, withCommonOptions, write } from './shared.js';
import type { CommonOptions } from './shared.js';

/** 註冊 index / reindex / directories 指令 */
export function registerIndexCommand(program: Command): void {
  withCommonOptions(
    program
      .command('index')
      .description('Index the files in one or more directories and remember them for reindex')
      .argument('<directories...>', 'Directories to index'),
  ).action(async (directories: string[], opts: CommonOptions) => {
    const interrupt = abortOnInterrupt();
    try {
      await withRuntime(opts, async (rt) => {
        await forEachInput(directories, (d) => d, async (directory) => {
          const report = await rt.directorySync.scan(directory, { signal: interrupt.signal });
          write(formatter.formatObject(report, opts.format));
          if (report.failed > 0) process.exitCode = 1;
        });
      });
    } finally {
      interrupt.dispose();
    }
  });

  withCommonOptions(
    program
      .command('reindex')
      .description('Rescan every remembered directory'),
  ).action(async (opts: CommonOptions) => {
    const interrupt = abortOnInterrupt();
    try {
      await withRuntime(opts, async (rt) => {
        const results = await rt.directorySync.reindexAll({ signal: interrupt.signal });
        write(formatter.formatObject(results, opts.format));
        if (results.some((r) => r.error || (r.report?.failed ?? 0) > 0)) process.exitCode = 1;
      });
    } finally {
      interrupt.dispose();
    }
  });

  withCommonOptions(
    program
      .command('directories')
      .description('List remembered directories and when they were last scanned'),
  ).action(async (opts: CommonOptions) => {
    await withRuntime(opts, (rt) => {
      const rows = rt.directorySync.listDirectories().map((d) => ({
        path: d.path,
        lastScanned: d.lastScanned === null ? null : new Date(d.lastScanned).toISOString(),
      }));
      write(formatter.formatObject(rows, opts.format));
    });
  });
}
