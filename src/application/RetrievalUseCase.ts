import type { CorpusPort, SnippetOptions } from '../domain/ports/CorpusPort.js';
import type { EmbeddingGateway } from '../infrastructure/embedding/EmbeddingGateway.js';
import type { LexicalResult, ScoredItem } from './dto/SearchResults.js';
import { EmptyInputError, NotFoundError } from '../domain/errors/DomainErrors.js';

function assertTopK(k: number): void {
  if (!Number.isInteger(k) || k <= 0) {
    throw new RangeError(`k must be a positive integer, got ${k}`);
  }
}

/**
 * 唯讀檢索：向量（cosine）、全文（FTS5 BM25）、相似項目
 * 兩種搜尋的結果不合併
 */
export class RetrievalUseCase {
  constructor(
    private readonly corpus: CorpusPort,
    private readonly embedding: EmbeddingGateway,
    private readonly snippet: SnippetOptions,
  ) {}

  async vectorSearch(query: string, k: number): Promise<ScoredItem[]> {
    assertTopK(k);
    if (!query.trim()) throw new EmptyInputError('query');

    const vector = await this.embedding.embedOne(query);
    return this.corpus.searchVector(vector, k).map((hit) => ({
      identifier: hit.identifier,
      text: hit.text,
      score: 1 - hit.distance,
    }));
  }

  /** raw=true 時 query 以 FTS5 語法解讀（AND/OR/NEAR、前綴等） */
  lexicalSearch(query: string, k: number, options: { raw?: boolean } = {}): LexicalResult[] {
    assertTopK(k);
    if (!query.trim()) throw new EmptyInputError('query');

    return this.corpus.searchLexical(query, k, this.snippet, options.raw ?? false).map((hit) => ({
      identifier: hit.identifier,
      snippet: hit.snippet,
      rank: hit.rank,
    }));
  }

  /** 以已存的 embedding 查詢，多取一筆後排除自己 */
  similarTo(identifier: string, k: number): ScoredItem[] {
    assertTopK(k);
    const vector = this.corpus.getEmbedding(identifier);
    if (!vector) throw new NotFoundError('item', identifier);

    return this.corpus.searchVector(vector, k + 1)
      .filter((hit) => hit.identifier !== identifier)
      .slice(0, k)
      .map((hit) => ({ identifier: hit.identifier, text: hit.text, score: 1 - hit.distance }));
  }
}
