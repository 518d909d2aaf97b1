import type { LitdbConfig } from './types.js';

export const CONFIG_FILENAME = 'litdb.json';

export const DEFAULT_CONFIG: LitdbConfig = {
  version: 1,
  database: {
    path: 'litdb.db',
  },
  embedding: {
    provider: 'openai',
    model: 'text-embedding-3-small',
    dimension: 1536,
    maxInputChars: 8000,
    maxBatchSize: 100,
    timeoutMs: 60000,
    maxRetries: 3,
    retryBaseDelayMs: 500,
  },
  llm: {
    provider: 'openai-compatible',
    baseUrl: 'http://localhost:11434/v1',
    model: 'llama2',
    timeoutMs: 120000,
  },
  openalex: {
    baseUrl: 'https://api.openalex.org',
    perPage: 200,
    timeoutMs: 30000,
    maxRetries: 3,
    retryBaseDelayMs: 1000,
    sinceFilter: 'from_created_date',
  },
  search: {
    defaultTopK: 3,
    snippet: {
      open: '',
      close: '',
      ellipsis: '',
      tokens: 16,
    },
  },
  index: {
    extensions: ['.pdf', '.docx', '.pptx', '.org', '.md', '.html', '.bib', '.ipynb'],
    skipHidden: true,
  },
};
