import type { Command } from 'commander';
import { withRuntime } from '../runtime.js';
import { formatter, parsePositiveInt, withCommonOptions, write } from './shared.js';
import type { CommonOptions } from './shared.js';
import type { DetailLevel } from '../formatters/ProgressiveDisclosureFormatter.js';

interface SearchCommandOptions extends CommonOptions {
  n?: number;
  level: DetailLevel;
}

interface FulltextCommandOptions extends CommonOptions {
  n?: number;
  raw?: boolean;
}

/** 註冊 vsearch / fulltext / similar / ask 指令 */
export function registerSearchCommand(program: Command): void {
  withCommonOptions(
    program
      .command('vsearch')
      .description('Vector (semantic) search')
      .argument('<query...>', 'Query text')
      .option('-n <number>', 'Number of results', parsePositiveInt)
      .option('--level <level>', 'Detail level: brief, normal, full', 'normal'),
  ).action(async (words: string[], opts: SearchCommandOptions) => {
    await withRuntime(opts, async (rt) => {
      const k = opts.n ?? rt.config.search.defaultTopK;
      const results = await rt.retrieval.vectorSearch(words.join(' '), k);
      write(formatter.formatScored(results, opts.format, opts.level));
    });
  });

  withCommonOptions(
    program
      .command('fulltext')
      .description('Full-text search (SQLite FTS5)')
      .argument('<query...>', 'Query text')
      .option('-n <number>', 'Number of results', parsePositiveInt)
      .option('--raw', 'Pass the query through as FTS5 syntax (AND, OR, NEAR, prefix*)'),
  ).action(async (words: string[], opts: FulltextCommandOptions) => {
    await withRuntime(opts, (rt) => {
      const k = opts.n ?? rt.config.search.defaultTopK;
      const results = rt.retrieval.lexicalSearch(words.join(' '), k, { raw: opts.raw });
      write(formatter.formatLexical(results, opts.format));
    });
  });

  withCommonOptions(
    program
      .command('similar')
      .description('Find items similar to a stored item')
      .argument('<identifier>', 'Identifier of a stored item')
      .option('-n <number>', 'Number of results', parsePositiveInt)
      .option('--level <level>', 'Detail level: brief, normal, full', 'normal'),
  ).action(async (identifier: string, opts: SearchCommandOptions) => {
    await withRuntime(opts, (rt) => {
      const k = opts.n ?? rt.config.search.defaultTopK;
      write(formatter.formatScored(rt.retrieval.similarTo(identifier, k), opts.format, opts.level));
    });
  });

  withCommonOptions(
    program
      .command('ask')
      .alias('gpt')
      .description('Answer a prompt using the closest stored items as context')
      .argument('<prompt...>', 'Prompt')
      .option('-n <number>', 'Number of items to use as context', parsePositiveInt),
  ).action(async (words: string[], opts: SearchCommandOptions) => {
    await withRuntime(opts, async (rt) => {
      const result = await rt.ask.ask(words.join(' '), opts.n ?? rt.config.search.defaultTopK);
      if (opts.format === 'json') {
        write(formatter.formatObject(result, 'json'));
        return;
      }
      write(result.answer);
      write('\nThe text was generated using these references:\n');
      write(result.references.map((r, i) => `${i + 1}. ${r.identifier}`).join('\n'));
    });
  });
}
