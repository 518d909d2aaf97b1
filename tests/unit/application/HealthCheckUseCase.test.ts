import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { HealthCheckUseCase } from '../../../src/application/HealthCheckUseCase.js';
import { FTS5Adapter } from '../../../src/infrastructure/sqlite/FTS5Adapter.js';
import { SqliteVecAdapter } from '../../../src/infrastructure/sqlite/SqliteVecAdapter.js';
import { createTestStore, vocabVector, TEST_SNIPPET } from '../../helpers/fakes.js';
import type { TestStore } from '../../helpers/fakes.js';

describe('HealthCheckUseCase', () => {
  let store: TestStore;
  let vec: SqliteVecAdapter;
  let fts5: FTS5Adapter;
  let useCase: HealthCheckUseCase;

  beforeEach(async () => {
    store = createTestStore();
    const db = store.dbMgr.getDb();
    vec = new SqliteVecAdapter(db);
    fts5 = new FTS5Adapter(db);
    useCase = new HealthCheckUseCase(db, vec, fts5, store.gateway);

    await store.ingest.submit({ identifier: 'note:a', text: 'graphene catalyst' });
    await store.ingest.submit({ identifier: 'note:b', text: 'polymer battery' });
  });

  afterEach(() => {
    store.dbMgr.close();
  });

  function itemId(identifier: string): number {
    const item = store.corpus.get(identifier);
    if (!item) throw new Error(`${identifier} missing`);
    return item.itemId;
  }

  it('should report a consistent store as healthy', async () => {
    expect(await useCase.check()).toEqual({
      healthy: true,
      totalItems: 2,
      totalVectors: 2,
      missingVectors: [],
      orphanedVectorIds: [],
      ftsConsistent: true,
      ftsIssues: [],
      fixActions: [],
    });
  });

  it('should report items without vectors and only fix them when asked', async () => {
    const id = itemId('note:b');
    vec.deleteRow(id);

    const report = await useCase.check();
    expect(report.healthy).toBe(false);
    expect(report.missingVectors).toEqual(['note:b']);
    expect(report.fixActions).toEqual([]);
    expect(vec.getEmbedding(id)).toBeUndefined();

    const fixed = await useCase.check({ fix: true });
    expect(fixed.fixActions).toEqual(['Re-embedded 1 items missing vectors']);
    expect(vec.getEmbedding(id)).toEqual(vocabVector('polymer battery'));
    expect((await useCase.check()).healthy).toBe(true);
  });

  it('should delete vectors that belong to no item', async () => {
    vec.insertRow(99, vocabVector('graphene'));

    const report = await useCase.check({ fix: true });

    expect(report.orphanedVectorIds).toEqual([99]);
    expect(report.fixActions).toEqual(['Deleted 1 orphaned vectors']);
    expect(vec.listRowIds()).not.toContain(99);
  });

  it('should rebuild the full-text index when it is out of step with items', async () => {
    // 繞過 corpus store 直接寫入 items：兩個索引都沒有這筆
    store.dbMgr.getDb().prepare(
      "INSERT INTO items(identifier, text, content_hash, added_at, updated_at) VALUES('note:c', 'catalyst design', 'hash', 0, 0)"
    ).run();

    const report = await useCase.check({ fix: true });

    expect(report.missingVectors).toEqual(['note:c']);
    expect(report.ftsConsistent).toBe(false);
    expect(report.fixActions).toEqual(['Re-embedded 1 items missing vectors', 'Rebuilt FTS5 index']);

    expect((await useCase.check()).healthy).toBe(true);
    expect(store.corpus.searchLexical('design', 3, TEST_SNIPPET).map((h) => h.identifier)).toEqual(['note:c']);
  });
});
