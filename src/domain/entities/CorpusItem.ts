import type { ItemMetadata } from './ItemMetadata.js';

/** 已收錄的一筆文件（論文、網頁、筆記本、投影片…） */
export interface CorpusItem {
  itemId: number;
  /** 唯一識別：URL、DOI URL 或檔案的 canonical path */
  identifier: string;
  text: string;
  metadata: ItemMetadata;
  contentHash: string;
  /** 建立時間（ms），之後不再變動 */
  addedAt: number;
  updatedAt: number;
}

/** 送進 Dedup/Upsert 的候選項目 */
export interface Candidate {
  identifier: string;
  text: string;
  metadata?: ItemMetadata;
}
