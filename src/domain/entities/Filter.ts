/** 對 OpenAlex 的已存 filter（watch） */
export interface Filter {
  filterId: number;
  /** OpenAlex filter 表達式，例如 author.orcid:https://orcid.org/0000-0000-0000-0000 */
  query: string;
  description: string | null;
  /** 上次成功同步的日期（YYYY-MM-DD），null 表示從未同步 */
  watermark: string | null;
  createdAt: number;
}

/** 同步狀態機：idle → fetching → committing → idle */
export type FilterSyncState = 'idle' | 'fetching' | 'committing';
