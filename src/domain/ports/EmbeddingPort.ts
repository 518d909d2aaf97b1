export interface EmbeddingResult {
  vector: Float32Array;
  tokensUsed: number;
}

/** 遠端 embedding 服務；回傳順序與輸入相同 */
export interface EmbeddingPort {
  readonly providerId: string;
  /** 向量維度，必須與資料庫建立時記錄的一致 */
  readonly dimension: number;
  readonly modelId: string;
  embed(texts: string[], signal?: AbortSignal): Promise<EmbeddingResult[]>;
  embedOne(text: string, signal?: AbortSignal): Promise<EmbeddingResult>;
}
