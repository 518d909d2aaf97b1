import type { CorpusItem } from '../entities/CorpusItem.js';
import type { ItemMetadata } from '../entities/ItemMetadata.js';

export interface NewItem {
  identifier: string;
  text: string;
  metadata: ItemMetadata;
  contentHash: string;
  embedding: Float32Array;
}

export interface ItemReplacement {
  text: string;
  metadata: ItemMetadata;
  contentHash: string;
  /** undefined 表示 text 未變，保留原 embedding 與 FTS row */
  embedding?: Float32Array;
}

export interface VectorHit {
  itemId: number;
  identifier: string;
  text: string;
  /** cosine distance，越小越相近 */
  distance: number;
}

export interface LexicalHit {
  itemId: number;
  identifier: string;
  snippet: string;
  /** 翻轉後的 BM25，越大越相關 */
  rank: number;
}

export interface SnippetOptions {
  open: string;
  close: string;
  ellipsis: string;
  tokens: number;
}

/**
 * Corpus Store：items 表與兩個衍生索引（vec0、FTS5）
 * 所有寫入都在單一交易內同時更新三者
 */
export interface CorpusPort {
  has(identifier: string): boolean;
  get(identifier: string): CorpusItem | undefined;
  getEmbedding(identifier: string): Float32Array | undefined;
  /** 新增；identifier 已存在時回傳 false，不寫入任何資料 */
  insert(item: NewItem): boolean;
  /** 取代既有 item 的內容；identifier 不存在時丟 NotFoundError */
  replace(identifier: string, replacement: ItemReplacement): void;
  searchVector(vector: Float32Array, k: number): VectorHit[];
  searchLexical(query: string, k: number, snippet: SnippetOptions, raw?: boolean): LexicalHit[];
  listAddedSince(sinceMs: number): CorpusItem[];
  count(): number;
}
