import type { Command } from 'commander';
import { withRuntime } from '../runtime.js';
import { formatter, withCommonOptions, write } from './shared.js';
import type { CommonOptions } from './shared.js';
import { WorkSchema } from '../../domain/entities/Work.js';
import { toCitation } from '../../infrastructure/openalex/WorkFormatter.js';
import { formatOpenAccess } from '../../infrastructure/unpaywall/UnpaywallClient.js';

interface OpenAlexCommandOptions extends CommonOptions {
  endpoint: string;
}

function describeEntity(entity: Record<string, unknown>): string {
  const work = WorkSchema.safeParse(entity);
  if (work.success) return toCitation(work.data);
  return `${String(entity.id)}: ${String(entity.display_name)}`;
}

/** 註冊 openalex / author-search / unpaywall 指令（只查詢，不寫入資料庫） */
export function registerOpenAlexCommands(program: Command): void {
  withCommonOptions(
    program
      .command('openalex')
      .description('Run an OpenAlex filter query, e.g. "default.search:circular polymer"')
      .argument('<filter>', 'OpenAlex filter expression')
      .option('-e, --endpoint <endpoint>', 'Entity endpoint: works, authors, sources, ...', 'works'),
  ).action(async (filter: string, opts: OpenAlexCommandOptions) => {
    await withRuntime(opts, async (rt) => {
      const result = await rt.openalex.searchEntities(opts.endpoint, filter);
      if (opts.format === 'json') {
        write(formatter.formatObject(result, 'json'));
        return;
      }
      write(`Found ${result.totalCount} results.`);
      write(result.results.map(describeEntity).join('\n\n'));
    });
  });

  withCommonOptions(
    program
      .command('author-search')
      .description("Find an author's ORCID by name")
      .argument('<name...>', 'Author name'),
  ).action(async (words: string[], opts: CommonOptions) => {
    await withRuntime(opts, async (rt) => {
      const hints = await rt.openalex.autocompleteAuthors(words.join(' '));
      if (opts.format === 'json') {
        write(formatter.formatObject(hints, 'json'));
        return;
      }
      write(hints
        .map((h) => `- ${h.display_name}\n  ${h.hint ?? ''} ${h.external_id ?? ''}`.trimEnd())
        .join('\n\n'));
    });
  });

  withCommonOptions(
    program
      .command('unpaywall')
      .description('Look up open access copies of a DOI (uses openalex.email)')
      .argument('<doi>', 'DOI, with or without https://doi.org/'),
  ).action(async (doi: string, opts: CommonOptions) => {
    await withRuntime(opts, async (rt) => {
      const record = await rt.unpaywall.lookup(doi);
      write(opts.format === 'json' ? formatter.formatObject(record, 'json') : formatOpenAccess(record));
    });
  });
}
