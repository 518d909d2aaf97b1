import type Database from 'better-sqlite3';
import type {
  CorpusPort, ItemReplacement, LexicalHit, NewItem, SnippetOptions, VectorHit,
} from '../../domain/ports/CorpusPort.js';
import type { CorpusItem } from '../../domain/entities/CorpusItem.js';
import { parseMetadataJson } from '../../domain/entities/ItemMetadata.js';
import { NotFoundError } from '../../domain/errors/DomainErrors.js';
import { SqliteVecAdapter } from './SqliteVecAdapter.js';
import { FTS5Adapter } from './FTS5Adapter.js';

interface ItemRow {
  item_id: number;
  identifier: string;
  text: string;
  metadata_json: string | null;
  content_hash: string;
  added_at: number;
  updated_at: number;
}

const ITEM_COLUMNS = 'item_id, identifier, text, metadata_json, content_hash, added_at, updated_at';

function toItem(row: ItemRow): CorpusItem {
  return {
    itemId: row.item_id,
    identifier: row.identifier,
    text: row.text,
    metadata: parseMetadataJson(row.metadata_json),
    contentHash: row.content_hash,
    addedAt: row.added_at,
    updatedAt: row.updated_at,
  };
}

/**
 * CorpusPort 的 SQLite 實作
 * items、items_vec、items_fts 三者在同一個 better-sqlite3 交易內寫入，
 * 任一步失敗整筆 rollback，三個表的 row 集合維持一致
 */
export class SqliteCorpusStore implements CorpusPort {
  private readonly vec: SqliteVecAdapter;
  private readonly fts: FTS5Adapter;

  constructor(
    private readonly db: Database.Database,
    private readonly now: () => number = Date.now,
  ) {
    this.vec = new SqliteVecAdapter(db);
    this.fts = new FTS5Adapter(db);
  }

  has(identifier: string): boolean {
    return this.db.prepare<[string], { found: number }>(
      'SELECT 1 AS found FROM items WHERE identifier = ?'
    ).get(identifier) !== undefined;
  }

  get(identifier: string): CorpusItem | undefined {
    const row = this.db.prepare<[string], ItemRow>(
      `SELECT ${ITEM_COLUMNS} FROM items WHERE identifier = ?`
    ).get(identifier);
    return row ? toItem(row) : undefined;
  }

  getEmbedding(identifier: string): Float32Array | undefined {
    const row = this.db.prepare<[string], { item_id: number }>(
      'SELECT item_id FROM items WHERE identifier = ?'
    ).get(identifier);
    return row ? this.vec.getEmbedding(row.item_id) : undefined;
  }

  insert(item: NewItem): boolean {
    const tx = this.db.transaction((next: NewItem): boolean => {
      // 交易內再檢查一次：embedding 呼叫期間可能已有其他寫入
      if (this.has(next.identifier)) return false;

      const timestamp = this.now();
      const result = this.db.prepare(`
        INSERT INTO items(identifier, text, metadata_json, content_hash, added_at, updated_at)
        VALUES(?, ?, ?, ?, ?, ?)
      `).run(
        next.identifier,
        next.text,
        JSON.stringify(next.metadata),
        next.contentHash,
        timestamp,
        timestamp,
      );
      const itemId = Number(result.lastInsertRowid);

      this.vec.insertRow(itemId, next.embedding);
      this.fts.insertRow({ itemId, identifier: next.identifier, text: next.text });
      return true;
    });
    return tx(item);
  }

  replace(identifier: string, replacement: ItemReplacement): void {
    const tx = this.db.transaction((id: string, next: ItemReplacement): void => {
      const row = this.db.prepare<[string], ItemRow>(
        `SELECT ${ITEM_COLUMNS} FROM items WHERE identifier = ?`
      ).get(id);
      if (!row) throw new NotFoundError('item', id);

      if (next.embedding === undefined && next.text !== row.text) {
        throw new Error(`Replacement for "${id}" changes text without a new embedding`);
      }

      this.db.prepare(`
        UPDATE items
        SET text = ?, metadata_json = ?, content_hash = ?, updated_at = ?
        WHERE item_id = ?
      `).run(next.text, JSON.stringify(next.metadata), next.contentHash, this.now(), row.item_id);

      if (next.embedding !== undefined) {
        this.vec.deleteRow(row.item_id);
        this.vec.insertRow(row.item_id, next.embedding);
        this.fts.deleteRow({ itemId: row.item_id, identifier: row.identifier, text: row.text });
        this.fts.insertRow({ itemId: row.item_id, identifier: row.identifier, text: next.text });
      }
    });
    tx(identifier, replacement);
  }

  searchVector(vector: Float32Array, k: number): VectorHit[] {
    if (k <= 0) return [];
    const hits = this.vec.searchKNN(vector, k);
    if (hits.length === 0) return [];

    const placeholders = hits.map(() => '?').join(', ');
    const rows = this.db.prepare<number[], { item_id: number; identifier: string; text: string }>(
      `SELECT item_id, identifier, text FROM items WHERE item_id IN (${placeholders})`
    ).all(...hits.map((h) => h.itemId));
    const byId = new Map(rows.map((r) => [r.item_id, r]));

    const results: VectorHit[] = [];
    for (const hit of hits) {
      const row = byId.get(hit.itemId);
      if (!row) continue;
      results.push({ itemId: row.item_id, identifier: row.identifier, text: row.text, distance: hit.distance });
    }
    return results;
  }

  searchLexical(query: string, k: number, snippet: SnippetOptions, raw = false): LexicalHit[] {
    if (k <= 0) return [];
    return this.fts.search(query, k, snippet, raw);
  }

  listAddedSince(sinceMs: number): CorpusItem[] {
    return this.db.prepare<[number], ItemRow>(
      `SELECT ${ITEM_COLUMNS} FROM items WHERE added_at >= ? ORDER BY added_at, item_id`
    ).all(sinceMs).map(toItem);
  }

  count(): number {
    const row = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM items').get();
    return row?.n ?? 0;
  }
}
