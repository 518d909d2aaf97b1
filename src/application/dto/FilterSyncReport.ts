import type { FailureRecord } from '../../domain/value-objects/Outcome.js';
import type { Watermark } from '../../domain/value-objects/Watermark.js';

/** 單一 filter 一次同步的結果 */
export interface FilterSyncReport {
  query: string;
  newCount: number;
  updatedCount: number;
  skippedCount: number;
  errors: FailureRecord[];
  watermarkBefore: Watermark | null;
  watermarkAfter: Watermark | null;
  advanced: boolean;
  /** 取得遠端資料失敗或中止時的原因；此時 watermark 不動 */
  fetchError?: { code: string; message: string };
}
