import type { Command } from 'commander';
import { withRuntime } from '../runtime.js';
import { formatter, forEachInput, withCommonOptions, write } from './shared.js';
import type { CommonOptions } from './shared.js';

interface AddCommandOptions extends CommonOptions {
  references?: boolean;
  citing?: boolean;
  related?: boolean;
  refresh?: boolean;
}

/** 註冊 add 指令 */
export function registerAddCommand(program: Command): void {
  withCommonOptions(
    program
      .command('add')
      .description('Add DOIs, ORCIDs, URLs or files (pdf, docx, pptx, html, bib, ipynb, text)')
      .argument('<sources...>', 'Sources to add')
      .option('--references', 'Also add the references of a DOI')
      .option('--citing', 'Also add works citing a DOI')
      .option('--related', 'Also add works related to a DOI')
      .option('--refresh', 'Re-read sources that are already stored'),
  ).action(async (sources: string[], opts: AddCommandOptions) => {
    await withRuntime(opts, async (rt) => {
      await forEachInput(sources, (s) => s, async (source) => {
        const outcomes = await rt.addSource.add(source, {
          references: opts.references,
          citing: opts.citing,
          related: opts.related,
          onExisting: opts.refresh ? 'refresh' : 'skip',
        });
        write(formatter.formatOutcomes(outcomes, opts.format));
        if (outcomes.some((o) => o.kind === 'failed')) process.exitCode = 1;
      });
    });
  });
}
