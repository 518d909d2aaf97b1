/** 資料庫設定 */
export interface DatabaseConfig {
  /** 相對於設定根目錄，或絕對路徑 */
  path: string;
}

/** Embedding 提供者設定 */
export interface EmbeddingConfig {
  provider: 'openai';
  model: string;
  dimension: number;
  /** 送出前截斷的字元數上限 */
  maxInputChars: number;
  maxBatchSize: number;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  apiKey?: string;
  baseUrl?: string;
}

/** 文字生成（ask 指令）設定 */
export interface LLMConfig {
  /** 'openai-compatible' 或 'none'（停用） */
  provider: 'openai-compatible' | 'none';
  /** API base URL（OpenAI-compatible endpoint） */
  baseUrl: string;
  model: string;
  /** API key（可選，本地服務通常不需要） */
  apiKey?: string;
  timeoutMs: number;
}

/** OpenAlex 設定 */
export interface OpenAlexConfig {
  baseUrl: string;
  /** polite pool 用的 email */
  email?: string;
  apiKey?: string;
  /** 每頁筆數（1-200） */
  perPage: number;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  /** 增量同步時附加到 filter 的日期欄位 */
  sinceFilter: string;
}

/** FTS5 snippet() 參數 */
export interface SnippetConfig {
  open: string;
  close: string;
  ellipsis: string;
  /** 最多 64（FTS5 上限） */
  tokens: number;
}

/** 搜尋設定 */
export interface SearchConfig {
  defaultTopK: number;
  snippet: SnippetConfig;
}

/** 目錄索引設定 */
export interface IndexConfig {
  /** 小寫、含點 */
  extensions: string[];
  skipHidden: boolean;
}

/** 完整設定 */
export interface LitdbConfig {
  version: number;
  database: DatabaseConfig;
  embedding: EmbeddingConfig;
  llm: LLMConfig;
  openalex: OpenAlexConfig;
  search: SearchConfig;
  index: IndexConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof LitdbConfig]?: LitdbConfig[K] extends object ? Partial<LitdbConfig[K]> : LitdbConfig[K];
};
