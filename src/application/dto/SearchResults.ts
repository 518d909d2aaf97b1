/** 向量搜尋結果（vectorSearch / similarTo） */
export interface ScoredItem {
  identifier: string;
  text: string;
  /** cosine similarity = 1 - cosine distance */
  score: number;
}

/** 全文搜尋結果 */
export interface LexicalResult {
  identifier: string;
  snippet: string;
  /** 翻轉後的 BM25，越大越相關 */
  rank: number;
}
