import type { Command } from 'commander';
import { withRuntime } from '../runtime.js';
import { formatter, forEachInput, withCommonOptions, write } from './shared.js';
import type { CommonOptions } from './shared.js';

interface ReviewCommandOptions extends CommonOptions {
  since: string;
}

/** 註冊 review / bibtex / citation / about / sql 指令 */
export function registerReportCommands(program: Command): void {
  withCommonOptions(
    program
      .command('review')
      .description('List items added since a date (org-mode output)')
      .option('-s, --since <when>', 'ISO date or "<n> days|weeks|months|years ago"', '1 week ago'),
  ).action(async (opts: ReviewCommandOptions) => {
    await withRuntime(opts, (rt) => {
      write(formatter.formatReview(rt.reporting.review(opts.since), opts.format));
    });
  });

  withCommonOptions(
    program
      .command('bibtex')
      .description('Print BibTeX entries for stored items')
      .argument('<identifiers...>', 'Identifiers of stored items'),
  ).action(async (identifiers: string[], opts: CommonOptions) => {
    await withRuntime(opts, async (rt) => {
      await forEachInput(identifiers, (id) => id, (id) => write(rt.reporting.bibtex(id)));
    });
  });

  withCommonOptions(
    program
      .command('citation')
      .description('Print citation strings for stored items')
      .argument('<identifiers...>', 'Identifiers of stored items'),
  ).action(async (identifiers: string[], opts: CommonOptions) => {
    await withRuntime(opts, async (rt) => {
      let n = 0;
      await forEachInput(identifiers, (id) => id, (id) => {
        const citation = rt.reporting.citation(id);
        n++;
        write(`${String(n).padStart(2)}. ${citation}`);
      });
    });
  });

  withCommonOptions(
    program
      .command('about')
      .description('Show database location, size and counts'),
  ).action(async (opts: CommonOptions) => {
    await withRuntime(opts, (rt) => {
      write(formatter.formatObject(rt.reporting.about(), opts.format));
    });
  });

  withCommonOptions(
    program
      .command('sql')
      .description('Run a SQL statement against the database')
      .argument('<statement>', 'SQL statement'),
  ).action(async (statement: string, opts: CommonOptions) => {
    await withRuntime(opts, (rt) => {
      const result = rt.reporting.sql(statement);
      write(result.kind === 'rows'
        ? formatter.formatObject(result.rows, opts.format)
        : `${result.changes} rows changed`);
    });
  });
}
