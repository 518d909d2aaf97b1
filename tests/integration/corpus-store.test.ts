import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteVecAdapter } from '../../src/infrastructure/sqlite/SqliteVecAdapter.js';
import { NotFoundError } from '../../src/domain/errors/DomainErrors.js';
import { hashText } from '../../src/domain/value-objects/ContentHash.js';
import type { NewItem } from '../../src/domain/ports/CorpusPort.js';
import { createTestStore, vocabVector, TEST_SNIPPET } from '../helpers/fakes.js';
import type { TestStore } from '../helpers/fakes.js';

function newItem(identifier: string, text: string): NewItem {
  return { identifier, text, metadata: { title: identifier }, contentHash: hashText(text), embedding: vocabVector(text) };
}

/**
 * Feature: Corpus Store
 *
 * items、items_vec、items_fts 三者的 row 集合必須一致；
 * 任何寫入都在單一交易內完成。
 */
describe('SqliteCorpusStore', () => {
  let store: TestStore;
  let clock: number;

  beforeEach(() => {
    clock = 1_000;
    store = createTestStore({ now: () => clock });
  });

  afterEach(() => {
    store.dbMgr.close();
  });

  function vectorIds(): number[] {
    return new SqliteVecAdapter(store.dbMgr.getDb()).listRowIds();
  }

  it('should write the row and both index entries together', () => {
    expect(store.corpus.insert(newItem('doc:1', 'graphene membranes'))).toBe(true);

    const item = store.corpus.get('doc:1');
    expect(item?.text).toBe('graphene membranes');
    expect(item?.metadata).toEqual({ title: 'doc:1' });
    expect(item?.addedAt).toBe(1_000);
    expect(vectorIds()).toEqual([item?.itemId]);
    expect(store.corpus.searchLexical('membranes', 5, TEST_SNIPPET).map((h) => h.identifier)).toEqual(['doc:1']);
    expect(store.corpus.getEmbedding('doc:1')).toEqual(vocabVector('graphene membranes'));
  });

  it('should refuse a second row for the same identifier', () => {
    store.corpus.insert(newItem('doc:1', 'graphene membranes'));

    expect(store.corpus.insert(newItem('doc:1', 'polymer films'))).toBe(false);
    expect(store.corpus.count()).toBe(1);
    expect(store.corpus.get('doc:1')?.text).toBe('graphene membranes');
    expect(vectorIds()).toHaveLength(1);
  });

  it('should roll back the row when the vector index rejects the embedding', () => {
    const bad = { ...newItem('doc:bad', 'graphene'), embedding: new Float32Array(3) };

    expect(() => store.corpus.insert(bad)).toThrow();

    expect(store.corpus.has('doc:bad')).toBe(false);
    expect(store.corpus.count()).toBe(0);
    expect(vectorIds()).toEqual([]);
    expect(store.corpus.searchLexical('graphene', 5, TEST_SNIPPET)).toEqual([]);
  });

  it('should replace text, vector and lexical entry in one step', () => {
    store.corpus.insert(newItem('doc:1', 'graphene membranes'));
    clock = 2_000;

    store.corpus.replace('doc:1', {
      text: 'polymer battery',
      metadata: { title: 'revised' },
      contentHash: hashText('polymer battery'),
      embedding: vocabVector('polymer battery'),
    });

    const item = store.corpus.get('doc:1');
    expect(item?.text).toBe('polymer battery');
    expect(item?.addedAt).toBe(1_000);
    expect(item?.updatedAt).toBe(2_000);
    expect(store.corpus.getEmbedding('doc:1')).toEqual(vocabVector('polymer battery'));
    expect(store.corpus.searchLexical('membranes', 5, TEST_SNIPPET)).toEqual([]);
    expect(store.corpus.searchLexical('battery', 5, TEST_SNIPPET).map((h) => h.identifier)).toEqual(['doc:1']);
  });

  it('should update metadata alone when the text is unchanged', () => {
    store.corpus.insert(newItem('doc:1', 'graphene membranes'));

    store.corpus.replace('doc:1', {
      text: 'graphene membranes',
      metadata: { title: 'renamed' },
      contentHash: hashText('graphene membranes'),
    });

    expect(store.corpus.get('doc:1')?.metadata).toEqual({ title: 'renamed' });
    expect(store.corpus.searchLexical('graphene', 5, TEST_SNIPPET)).toHaveLength(1);
  });

  it('should reject a text change without a new embedding', () => {
    store.corpus.insert(newItem('doc:1', 'graphene membranes'));

    expect(() => store.corpus.replace('doc:1', {
      text: 'something else',
      metadata: {},
      contentHash: hashText('something else'),
    })).toThrow('changes text without a new embedding');
    expect(store.corpus.get('doc:1')?.text).toBe('graphene membranes');
  });

  it('should throw NotFoundError when replacing a missing item', () => {
    expect(() => store.corpus.replace('doc:missing', {
      text: 'x', metadata: {}, contentHash: hashText('x'), embedding: vocabVector('x'),
    })).toThrow(NotFoundError);
  });

  it('should list items added since a time in insertion order', () => {
    store.corpus.insert(newItem('doc:old', 'graphene'));
    clock = 5_000;
    store.corpus.insert(newItem('doc:new1', 'polymer'));
    store.corpus.insert(newItem('doc:new2', 'battery'));

    expect(store.corpus.listAddedSince(5_000).map((i) => i.identifier)).toEqual(['doc:new1', 'doc:new2']);
    expect(store.corpus.listAddedSince(0)).toHaveLength(3);
  });

  it('should return nothing for k <= 0', () => {
    store.corpus.insert(newItem('doc:1', 'graphene'));
    expect(store.corpus.searchVector(vocabVector('graphene'), 0)).toEqual([]);
    expect(store.corpus.searchLexical('graphene', 0, TEST_SNIPPET)).toEqual([]);
  });
});
