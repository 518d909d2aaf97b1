import type Database from 'better-sqlite3';

export interface VecHit {
  itemId: number;
  /** cosine distance（0 = 同方向，2 = 反方向） */
  distance: number;
}

function toBlob(vector: Float32Array): Buffer {
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

/**
 * sqlite-vec adapter：管理 vec0 虛擬表的插入、刪除、讀回與 KNN 查詢
 *
 * 注意：sqlite-vec v0.1.x 的 PK 型別檢查要求 SQLite INTEGER，
 * better-sqlite3 的 JS number 會被綁為 REAL，需用 BigInt 才會綁為 INTEGER。
 */
export class SqliteVecAdapter {
  constructor(private readonly db: Database.Database) {}

  insertRow(itemId: number, embedding: Float32Array): void {
    this.db.prepare(
      'INSERT INTO items_vec(rowid, embedding) VALUES(?, ?)'
    ).run(BigInt(itemId), toBlob(embedding));
  }

  deleteRow(itemId: number): void {
    this.db.prepare('DELETE FROM items_vec WHERE rowid = ?').run(BigInt(itemId));
  }

  getEmbedding(itemId: number): Float32Array | undefined {
    const row = this.db.prepare<[bigint], { embedding: Buffer }>(
      'SELECT embedding FROM items_vec WHERE rowid = ?'
    ).get(BigInt(itemId));
    if (!row) return undefined;
    // 複製到新的 ArrayBuffer：Buffer 的 byteOffset 不一定對齊 4 bytes
    return new Float32Array(new Uint8Array(row.embedding).buffer);
  }

  listRowIds(): number[] {
    return this.db.prepare<[], { rowid: number | bigint }>('SELECT rowid FROM items_vec')
      .all()
      .map((r) => Number(r.rowid));
  }

  /**
   * 依 cosine distance 遞增取前 topK，距離相同時以 itemId（插入順序）排序
   * vec0 的 KNN 在 k 截斷同分 row 時不依 rowid，所以改以全表計算距離後排序
   */
  searchKNN(queryVec: Float32Array, topK: number): VecHit[] {
    const rows = this.db.prepare<[Buffer, number], { item_id: number | bigint; distance: number }>(`
      SELECT rowid AS item_id, vec_distance_cosine(embedding, ?) AS distance
      FROM items_vec
      ORDER BY distance, rowid
      LIMIT ?
    `).all(toBlob(queryVec), topK);

    return rows.map((row) => ({ itemId: Number(row.item_id), distance: row.distance }));
  }
}
