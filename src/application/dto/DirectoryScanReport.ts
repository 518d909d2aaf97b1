import type { FailureRecord } from '../../domain/value-objects/Outcome.js';

/** 單一目錄掃描結果 */
export interface DirectoryScanReport {
  /** canonical 絕對路徑 */
  directory: string;
  filesSeen: number;
  added: number;
  skipped: number;
  failed: number;
  failures: FailureRecord[];
  lastScanned: number;
}

/** reindexAll 的單一目錄結果；掃描整體失敗時只有 error */
export interface ReindexResult {
  directory: string;
  report?: DirectoryScanReport;
  error?: { code: string; message: string };
}
