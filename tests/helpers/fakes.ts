import { DatabaseManager } from '../../src/infrastructure/sqlite/DatabaseManager.js';
import { SqliteCorpusStore } from '../../src/infrastructure/sqlite/SqliteCorpusStore.js';
import { SqliteFilterRepository } from '../../src/infrastructure/sqlite/SqliteFilterRepository.js';
import { SqliteDirectoryRepository } from '../../src/infrastructure/sqlite/SqliteDirectoryRepository.js';
import { EmbeddingGateway } from '../../src/infrastructure/embedding/EmbeddingGateway.js';
import { IngestUseCase } from '../../src/application/IngestUseCase.js';
import { RetrievalUseCase } from '../../src/application/RetrievalUseCase.js';
import { WorkSchema } from '../../src/domain/entities/Work.js';
import type { Author, AuthorHint, Work } from '../../src/domain/entities/Work.js';
import type { EmbeddingPort, EmbeddingResult } from '../../src/domain/ports/EmbeddingPort.js';
import type { BibliographicPort, EntitySearchResult, WorksPage } from '../../src/domain/ports/BibliographicPort.js';
import type { SnippetOptions } from '../../src/domain/ports/CorpusPort.js';
import { NotFoundError } from '../../src/domain/errors/DomainErrors.js';

/** 每個詞對應一個維度；不含任何詞的文字落在最後一維 */
export const VOCABULARY: readonly string[] = [
  'graphene', 'polymer', 'catalyst', 'battery', 'protein', 'neural', 'climate',
];

export const TEST_DIMENSION = VOCABULARY.length + 1;

export function vocabVector(text: string): Float32Array {
  const vector = new Float32Array(TEST_DIMENSION);
  for (const word of text.toLowerCase().match(/[a-z]+/g) ?? []) {
    const index = VOCABULARY.indexOf(word);
    if (index >= 0) vector[index] += 1;
  }
  if (vector.every((x) => x === 0)) vector[VOCABULARY.length] = 1;
  return vector;
}

/** 以詞彙計數當向量的 embedding provider，可注入失敗與呼叫 hook */
export class FakeEmbeddingProvider implements EmbeddingPort {
  readonly providerId = 'fake';
  readonly modelId = 'fake-model';
  readonly dimension = TEST_DIMENSION;
  readonly inputs: string[][] = [];
  failure?: Error;
  onEmbed?: (texts: string[]) => void;

  async embed(texts: string[]): Promise<EmbeddingResult[]> {
    this.inputs.push(texts);
    this.onEmbed?.(texts);
    if (this.failure) throw this.failure;
    return texts.map((t) => ({ vector: vocabVector(t), tokensUsed: t.length }));
  }

  async embedOne(text: string): Promise<EmbeddingResult> {
    const [result] = await this.embed([text]);
    return result;
  }

  get callCount(): number {
    return this.inputs.length;
  }
}

export const TEST_SNIPPET: SnippetOptions = { open: '[', close: ']', ellipsis: '...', tokens: 8 };

export interface TestStore {
  dbMgr: DatabaseManager;
  corpus: SqliteCorpusStore;
  filters: SqliteFilterRepository;
  directories: SqliteDirectoryRepository;
  provider: FakeEmbeddingProvider;
  gateway: EmbeddingGateway;
  ingest: IngestUseCase;
  retrieval: RetrievalUseCase;
}

/** in-memory SQLite + 假 embedding，測試結束記得 dbMgr.close() */
export function createTestStore(options: { now?: () => number } = {}): TestStore {
  const dbMgr = new DatabaseManager(':memory:', TEST_DIMENSION);
  const db = dbMgr.getDb();
  const corpus = new SqliteCorpusStore(db, options.now);
  const provider = new FakeEmbeddingProvider();
  const gateway = new EmbeddingGateway(provider, { maxRetries: 0, retryBaseDelayMs: 1 });
  const ingest = new IngestUseCase(corpus, gateway);
  return {
    dbMgr,
    corpus,
    filters: new SqliteFilterRepository(db, options.now),
    directories: new SqliteDirectoryRepository(db),
    provider,
    gateway,
    ingest,
    retrieval: new RetrievalUseCase(corpus, gateway, TEST_SNIPPET),
  };
}

export function makeWork(n: number, overrides: Record<string, unknown> = {}): Work {
  return WorkSchema.parse({
    id: `https://openalex.org/W${n}`,
    doi: `https://doi.org/10.1234/test.${n}`,
    title: `Graphene study ${n}`,
    type: 'article',
    publication_year: 2024,
    created_date: '2024-03-01',
    authorships: [{ author: { display_name: 'Ada Example' } }],
    abstract_inverted_index: { graphene: [0], catalyst: [1] },
    ...overrides,
  });
}

interface ScriptedFailure {
  afterPages: number;
  error: Error;
}

/**
 * 記憶體內的書目服務：依 filter 字串回傳預先排好的頁面
 * 帶有 from_created_date 的查詢找不到時，退回不帶日期的 filter
 */
export class FakeBibliographic implements BibliographicPort {
  readonly queries: string[] = [];
  readonly pages = new Map<string, Work[][]>();
  readonly failures = new Map<string, ScriptedFailure>();
  readonly works = new Map<string, Work>();
  readonly authors = new Map<string, Author>();
  hints: AuthorHint[] = [];
  entityCount = 1;

  private key(filter: string): string {
    return this.pages.has(filter) || this.failures.has(filter)
      ? filter
      : filter.split(',from_created_date:')[0];
  }

  async *queryWorks(filter: string, options: { signal?: AbortSignal } = {}): AsyncIterable<WorksPage> {
    this.queries.push(filter);
    const key = this.key(filter);
    const pages = this.pages.get(key) ?? [];
    const failure = this.failures.get(key);
    const totalCount = pages.reduce((n, page) => n + page.length, 0);

    for (const [i, works] of pages.entries()) {
      if (failure?.afterPages === i) throw failure.error;
      options.signal?.throwIfAborted();
      yield { works, totalCount };
    }
    if (failure?.afterPages === pages.length) throw failure.error;
  }

  async getWork(id: string): Promise<Work> {
    const work = this.works.get(id);
    if (!work) throw new NotFoundError('work', id);
    return work;
  }

  async getWorksByIds(ids: readonly string[]): Promise<Work[]> {
    return ids.flatMap((id) => {
      const work = [...this.works.values()].find((w) => w.id === id);
      return work ? [work] : [];
    });
  }

  async getAuthor(id: string): Promise<Author> {
    const author = this.authors.get(id);
    if (!author) throw new NotFoundError('author', id);
    return author;
  }

  async autocompleteAuthors(): Promise<AuthorHint[]> {
    return this.hints;
  }

  async searchEntities(): Promise<EntitySearchResult> {
    return { totalCount: this.entityCount, results: [] };
  }
}
