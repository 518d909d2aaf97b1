import type { Command } from 'commander';
import { withRuntime } from '../runtime.js';
import { abortOnInterrupt, formatter, withCommonOptions, write } from './shared.js';
import type { CommonOptions } from './shared.js';

interface AddFilterOptions extends CommonOptions {
  description?: string;
}

interface RemovableOptions extends CommonOptions {
  remove?: boolean;
}

function removed(found: boolean): string {
  return found ? '1 filter removed' : 'No matching filter';
}

/** 註冊 filter 相關指令：add-filter、rm-filter、list-filters、update-filters、follow、watch、citing、related */
export function registerFilterCommands(program: Command): void {
  withCommonOptions(
    program
      .command('add-filter')
      .description('Save an OpenAlex filter to check for new works')
      .argument('<filter>', 'OpenAlex filter expression')
      .option('-d, --description <text>', 'Description of the filter'),
  ).action(async (filter: string, opts: AddFilterOptions) => {
    await withRuntime(opts, (rt) => {
      const { filter: saved, created } = rt.filterSync.addFilter(filter, opts.description);
      write(created ? `Added filter ${saved.query}` : `Filter ${saved.query} already exists`);
    });
  });

  withCommonOptions(
    program
      .command('rm-filter')
      .description('Remove a saved filter')
      .argument('<filter>', 'OpenAlex filter expression'),
  ).action(async (filter: string, opts: CommonOptions) => {
    await withRuntime(opts, (rt) => {
      write(removed(rt.filterSync.removeFilter(filter)));
    });
  });

  withCommonOptions(
    program
      .command('list-filters')
      .description('List saved filters and their watermarks'),
  ).action(async (opts: CommonOptions) => {
    await withRuntime(opts, (rt) => {
      const filters = rt.filterSync.listFilters();
      if (opts.format === 'json') {
        write(formatter.formatObject(filters, 'json'));
        return;
      }
      write(filters
        .map((f) => `${f.query}  ${f.description ?? ''}  (last synced: ${f.watermark ?? 'never'})`)
        .join('\n'));
    });
  });

  withCommonOptions(
    program
      .command('update-filters')
      .description('Fetch new works for every saved filter'),
  ).action(async (opts: CommonOptions) => {
    const interrupt = abortOnInterrupt();
    try {
      await withRuntime(opts, async (rt) => {
        const reports = await rt.filterSync.syncAll({ signal: interrupt.signal });
        write(formatter.formatObject(reports, opts.format));
        if (reports.some((r) => r.fetchError || r.errors.length > 0)) process.exitCode = 1;
      });
    } finally {
      interrupt.dispose();
    }
  });

  withCommonOptions(
    program
      .command('follow')
      .description('Add the works of an author and follow them for new works')
      .argument('<orcid>', 'ORCID id or URL')
      .option('-r, --remove', 'Stop following'),
  ).action(async (orcid: string, opts: RemovableOptions) => {
    await withRuntime(opts, async (rt) => {
      if (opts.remove) {
        write(removed(rt.filterSync.unfollow(orcid)));
        return;
      }
      const result = await rt.filterSync.follow(orcid);
      write(`Following ${result.filter.description ?? orcid}: ${result.filter.query}`);
      if (result.ingested) write(formatter.formatObject(result.ingested, opts.format));
    });
  });

  withCommonOptions(
    program
      .command('watch')
      .description('Save an OpenAlex filter after checking that it matches works')
      .argument('<query...>', 'OpenAlex filter expression')
      .option('-r, --remove', 'Stop watching'),
  ).action(async (words: string[], opts: RemovableOptions) => {
    const query = words.join(' ');
    await withRuntime(opts, async (rt) => {
      if (opts.remove) {
        write(removed(rt.filterSync.removeFilter(query)));
        return;
      }
      const result = await rt.filterSync.watch(query);
      write(`Watching ${result.filter.query} (${result.matched ?? 0} matching works)`);
    });
  });

  withCommonOptions(
    program
      .command('citing')
      .description('Watch for new works citing a DOI')
      .argument('<doi>', 'DOI')
      .option('-r, --remove', 'Stop watching'),
  ).action(async (doi: string, opts: RemovableOptions) => {
    await withRuntime(opts, async (rt) => {
      if (opts.remove) {
        write(removed(await rt.filterSync.removeCiting(doi)));
        return;
      }
      const { filter, created } = await rt.filterSync.citing(doi);
      write(created ? `Added filter ${filter.query}` : `Filter ${filter.query} already exists`);
    });
  });

  withCommonOptions(
    program
      .command('related')
      .description('Watch for new works related to a DOI')
      .argument('<doi>', 'DOI')
      .option('-r, --remove', 'Stop watching'),
  ).action(async (doi: string, opts: RemovableOptions) => {
    await withRuntime(opts, async (rt) => {
      if (opts.remove) {
        write(removed(await rt.filterSync.removeRelated(doi)));
        return;
      }
      const { filter, created } = await rt.filterSync.related(doi);
      write(created ? `Added filter ${filter.query}` : `Filter ${filter.query} already exists`);
    });
  });
}
