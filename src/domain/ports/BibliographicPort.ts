import type { Author, AuthorHint, Work } from '../entities/Work.js';

export interface WorksPage {
  works: Work[];
  /** 查詢命中的總數（OpenAlex meta.count） */
  totalCount: number;
}

export interface EntitySearchResult {
  totalCount: number;
  results: Array<Record<string, unknown>>;
}

/**
 * 外部書目圖譜服務（OpenAlex）
 * queryWorks 以 cursor 分頁，呼叫端逐頁消費；任何失敗都以 ExternalServiceError 拋出
 */
export interface BibliographicPort {
  queryWorks(filter: string, options?: { signal?: AbortSignal }): AsyncIterable<WorksPage>;
  getWork(id: string, signal?: AbortSignal): Promise<Work>;
  getWorksByIds(ids: readonly string[], signal?: AbortSignal): Promise<Work[]>;
  getAuthor(id: string, signal?: AbortSignal): Promise<Author>;
  autocompleteAuthors(query: string, signal?: AbortSignal): Promise<AuthorHint[]>;
  searchEntities(endpoint: string, filter: string, signal?: AbortSignal): Promise<EntitySearchResult>;
}
