import { describe, it, expect, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { findConfigRoot, loadConfig, resolveDatabasePath } from '../../../src/config/ConfigLoader.js';

describe('ConfigLoader', () => {
  const tmpDir = path.join(os.tmpdir(), 'litdb-config-' + Date.now());

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    vi.unstubAllEnvs();
  });

  it('should return default config when no file exists', () => {
    const config = loadConfig('/nonexistent/path');
    expect(config.embedding.provider).toBe('openai');
    expect(config.embedding.dimension).toBe(1536);
    expect(config.search.defaultTopK).toBe(3);
    expect(config.openalex.sinceFilter).toBe('from_created_date');
  });

  it('should merge partial config over defaults', () => {
    const config = loadConfig('/nonexistent/path', {
      embedding: { model: 'text-embedding-3-large', dimension: 3072 },
    });
    expect(config.embedding.model).toBe('text-embedding-3-large');
    expect(config.embedding.dimension).toBe(3072);
    // 其他欄位仍用 defaults
    expect(config.embedding.maxBatchSize).toBe(100);
  });

  it('should read litdb.json and let overrides win over it', () => {
    fs.mkdirSync(tmpDir, { recursive: true });
    fs.writeFileSync(path.join(tmpDir, 'litdb.json'), JSON.stringify({
      database: { path: 'data/papers.db' },
      search: { defaultTopK: 5 },
    }));

    const config = loadConfig(tmpDir, { search: { defaultTopK: 7 } });
    expect(config.database.path).toBe('data/papers.db');
    expect(config.search.defaultTopK).toBe(7);
    expect(config.search.snippet.tokens).toBe(16);
  });

  it('should apply environment overrides last', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');
    vi.stubEnv('OPENALEX_EMAIL', 'reader@example.org');

    const config = loadConfig('/nonexistent/path', { openalex: { email: 'other@example.org' } });
    expect(config.embedding.apiKey).toBe('test-secret');
    expect(config.llm.apiKey).toBe('test-secret');
    expect(config.openalex.email).toBe('reader@example.org');
  });

  it('should validate dimension is positive integer', () => {
    expect(() =>
      loadConfig('/nonexistent', { embedding: { dimension: -1 } })
    ).toThrow('dimension must be a positive integer');
  });

  it('should reject extensions without a leading dot', () => {
    expect(() =>
      loadConfig('/nonexistent', { index: { extensions: ['pdf'] } })
    ).toThrow('extensions must start with a dot and be lowercase');
  });

  it('should find the config root by walking up from a subdirectory', () => {
    const nested = path.join(tmpDir, 'a', 'b');
    fs.mkdirSync(nested, { recursive: true });
    fs.writeFileSync(path.join(tmpDir, 'litdb.json'), '{}');

    expect(findConfigRoot(nested)).toBe(path.resolve(tmpDir));
  });

  it('should resolve a relative database path against the root', () => {
    const config = loadConfig('/nonexistent');
    expect(resolveDatabasePath('/home/reader', config)).toBe(path.resolve('/home/reader', 'litdb.db'));
    expect(resolveDatabasePath('/home/reader', { ...config, database: { path: ':memory:' } })).toBe(':memory:');
  });
});
