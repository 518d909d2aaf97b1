import type { LitdbError } from '../errors/DomainErrors.js';

export type SkipReason = 'duplicate' | 'unchanged';

/** 單筆 submit 的結果（取代以例外控制流程的「略過錯誤繼續」） */
export type Outcome =
  | { kind: 'inserted'; identifier: string }
  | { kind: 'updated'; identifier: string; reembedded: boolean }
  | { kind: 'skipped'; identifier: string; reason: SkipReason }
  | { kind: 'failed'; identifier: string; error: LitdbError };

export interface FailureRecord {
  identifier: string;
  code: string;
  message: string;
}

/** 批次作業的彙總 */
export interface BatchReport {
  inserted: number;
  updated: number;
  skipped: number;
  failed: number;
  failures: FailureRecord[];
}

export function toFailureRecord(outcome: Extract<Outcome, { kind: 'failed' }>): FailureRecord {
  return {
    identifier: outcome.identifier,
    code: outcome.error.code,
    message: outcome.error.message,
  };
}

export function summarize(outcomes: readonly Outcome[]): BatchReport {
  const report: BatchReport = { inserted: 0, updated: 0, skipped: 0, failed: 0, failures: [] };
  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case 'inserted': report.inserted++; break;
      case 'updated': report.updated++; break;
      case 'skipped': report.skipped++; break;
      case 'failed':
        report.failed++;
        report.failures.push(toFailureRecord(outcome));
        break;
    }
  }
  return report;
}
