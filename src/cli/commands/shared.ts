import { InvalidArgumentError, Option } from 'commander';
import type { Command } from 'commander';
import { LitdbError } from '../../domain/errors/DomainErrors.js';
import { ProgressiveDisclosureFormatter } from '../formatters/ProgressiveDisclosureFormatter.js';
import type { OutputFormat } from '../formatters/ProgressiveDisclosureFormatter.js';

export interface CommonOptions {
  root?: string;
  format: OutputFormat;
}

export const formatter = new ProgressiveDisclosureFormatter();

/** 每個指令共用 --root 與 --format */
export function withCommonOptions(cmd: Command): Command {
  return cmd
    .option('--root <path>', 'Directory containing litdb.json (default: search upward from cwd)')
    .addOption(new Option('--format <format>', 'Output format').choices(['text', 'json']).default('text'));
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function write(text: string): void {
  if (text) process.stdout.write(text + '\n');
}

/** domain error 以 Error [CODE]: message 形式輸出到 stderr，並設定 exit code */
export function reportError(err: LitdbError, subject?: string): void {
  const where = subject ? ` (${subject})` : '';
  process.stderr.write(`Error [${err.code}]${where}: ${err.message}\n`);
  process.exitCode = 1;
}

/** 逐一處理多個輸入，domain error 只影響該項，其餘錯誤往上拋 */
export async function forEachInput<T>(
  inputs: readonly T[],
  label: (input: T) => string,
  fn: (input: T) => Promise<void> | void,
): Promise<void> {
  for (const input of inputs) {
    try {
      await fn(input);
    } catch (err) {
      if (err instanceof LitdbError) {
        reportError(err, label(input));
      } else {
        throw err;
      }
    }
  }
}

/** Ctrl-C 時中止進行中的同步或掃描，週期不會被記錄為完成 */
export function abortOnInterrupt(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSigint = () => controller.abort(new Error('Interrupted'));
  process.once('SIGINT', onSigint);
  return {
    signal: controller.signal,
    dispose: () => process.removeListener('SIGINT', onSigint),
  };
}
