import path from 'node:path';
import { findConfigRoot, loadConfig, resolveDatabasePath } from '../config/ConfigLoader.js';
import type { LitdbConfig } from '../config/ConfigLoader.js';
import { DatabaseManager } from '../infrastructure/sqlite/DatabaseManager.js';
import { SqliteCorpusStore } from '../infrastructure/sqlite/SqliteCorpusStore.js';
import { SqliteFilterRepository } from '../infrastructure/sqlite/SqliteFilterRepository.js';
import { SqliteDirectoryRepository } from '../infrastructure/sqlite/SqliteDirectoryRepository.js';
import { SqliteVecAdapter } from '../infrastructure/sqlite/SqliteVecAdapter.js';
import { FTS5Adapter } from '../infrastructure/sqlite/FTS5Adapter.js';
import { OpenAIEmbeddingAdapter } from '../infrastructure/embedding/OpenAIEmbeddingAdapter.js';
import { EmbeddingGateway } from '../infrastructure/embedding/EmbeddingGateway.js';
import { OpenAICompletionAdapter } from '../infrastructure/llm/OpenAICompletionAdapter.js';
import { NullCompletionAdapter } from '../infrastructure/llm/NullCompletionAdapter.js';
import { OpenAlexClient } from '../infrastructure/openalex/OpenAlexClient.js';
import { UnpaywallClient } from '../infrastructure/unpaywall/UnpaywallClient.js';
import { ExtractorRegistry } from '../infrastructure/extraction/ExtractorRegistry.js';
import { HtmlExtractor } from '../infrastructure/extraction/HtmlExtractor.js';
import { NodeFileSystemAdapter } from '../infrastructure/filesystem/NodeFileSystemAdapter.js';
import { HttpWebPageAdapter } from '../infrastructure/web/HttpWebPageAdapter.js';
import { IngestUseCase } from '../application/IngestUseCase.js';
import { RetrievalUseCase } from '../application/RetrievalUseCase.js';
import { FileIngestor } from '../application/FileIngestor.js';
import { WorkIngestor } from '../application/WorkIngestor.js';
import { FilterSyncUseCase } from '../application/FilterSyncUseCase.js';
import { DirectorySyncUseCase } from '../application/DirectorySyncUseCase.js';
import { AddSourceUseCase } from '../application/AddSourceUseCase.js';
import { AskUseCase } from '../application/AskUseCase.js';
import { ReportingUseCase } from '../application/ReportingUseCase.js';
import { HealthCheckUseCase } from '../application/HealthCheckUseCase.js';
import type { CompletionPort } from '../domain/ports/CompletionPort.js';

/** 一次 CLI 呼叫所需的所有用例，結束時 close() 關閉資料庫 */
export interface Runtime {
  root: string;
  config: LitdbConfig;
  dbPath: string;
  openalex: OpenAlexClient;
  unpaywall: UnpaywallClient;
  ingest: IngestUseCase;
  retrieval: RetrievalUseCase;
  filterSync: FilterSyncUseCase;
  directorySync: DirectorySyncUseCase;
  addSource: AddSourceUseCase;
  ask: AskUseCase;
  reporting: ReportingUseCase;
  health: HealthCheckUseCase;
  close(): void;
}

function createCompletion(config: LitdbConfig): CompletionPort {
  if (config.llm.provider === 'openai-compatible') {
    return new OpenAICompletionAdapter({
      baseUrl: config.llm.baseUrl,
      apiKey: config.llm.apiKey,
      model: config.llm.model,
      timeoutMs: config.llm.timeoutMs,
    });
  }
  return new NullCompletionAdapter();
}

/**
 * 組裝依賴：root 未指定時從工作目錄往上找 litdb.json，找不到就用工作目錄
 */
export function createRuntime(options: { root?: string } = {}): Runtime {
  const root = options.root
    ? path.resolve(options.root)
    : findConfigRoot(process.cwd()) ?? process.cwd();
  const config = loadConfig(root);
  const dbPath = resolveDatabasePath(root, config);

  const dbMgr = new DatabaseManager(dbPath, config.embedding.dimension);
  const db = dbMgr.getDb();

  const corpus = new SqliteCorpusStore(db);
  const filters = new SqliteFilterRepository(db);
  const directories = new SqliteDirectoryRepository(db);
  const fs = new NodeFileSystemAdapter();

  const embedding = new EmbeddingGateway(
    new OpenAIEmbeddingAdapter({
      apiKey: config.embedding.apiKey ?? '',
      model: config.embedding.model,
      dimension: config.embedding.dimension,
      baseUrl: config.embedding.baseUrl,
      timeoutMs: config.embedding.timeoutMs,
    }),
    {
      maxBatchSize: config.embedding.maxBatchSize,
      maxInputChars: config.embedding.maxInputChars,
      maxRetries: config.embedding.maxRetries,
      retryBaseDelayMs: config.embedding.retryBaseDelayMs,
    },
  );

  const openalex = new OpenAlexClient({
    baseUrl: config.openalex.baseUrl,
    email: config.openalex.email,
    apiKey: config.openalex.apiKey,
    perPage: config.openalex.perPage,
    timeoutMs: config.openalex.timeoutMs,
    maxRetries: config.openalex.maxRetries,
    retryBaseDelayMs: config.openalex.retryBaseDelayMs,
  });

  const ingest = new IngestUseCase(corpus, embedding);
  const retrieval = new RetrievalUseCase(corpus, embedding, config.search.snippet);
  const html = new HtmlExtractor();
  const fileIngestor = new FileIngestor(fs, new ExtractorRegistry(), ingest);
  const workIngestor = new WorkIngestor(openalex, ingest);

  return {
    root,
    config,
    dbPath,
    openalex,
    unpaywall: new UnpaywallClient({
      email: config.openalex.email,
      timeoutMs: config.openalex.timeoutMs,
      maxRetries: config.openalex.maxRetries,
      retryBaseDelayMs: config.openalex.retryBaseDelayMs,
    }),
    ingest,
    retrieval,
    filterSync: new FilterSyncUseCase(filters, openalex, workIngestor, {
      sinceFilter: config.openalex.sinceFilter,
    }),
    directorySync: new DirectorySyncUseCase(directories, fs, corpus, fileIngestor, {
      extensions: config.index.extensions,
      skipHidden: config.index.skipHidden,
    }),
    addSource: new AddSourceUseCase(
      openalex,
      workIngestor,
      fileIngestor,
      ingest,
      fs,
      new HttpWebPageAdapter({ timeoutMs: config.openalex.timeoutMs }),
      html,
    ),
    ask: new AskUseCase(retrieval, createCompletion(config)),
    reporting: new ReportingUseCase(db, dbPath, corpus, filters, directories),
    health: new HealthCheckUseCase(db, new SqliteVecAdapter(db), new FTS5Adapter(db), embedding),
    close: () => dbMgr.close(),
  };
}

/** 開啟 runtime、執行 fn、最後一定關閉 */
export async function withRuntime<T>(
  options: { root?: string },
  fn: (runtime: Runtime) => Promise<T> | T,
): Promise<T> {
  const runtime = createRuntime(options);
  try {
    return await fn(runtime);
  } finally {
    runtime.close();
  }
}
