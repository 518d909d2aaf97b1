import Database from 'better-sqlite3';
import type { SnippetOptions } from '../../domain/ports/CorpusPort.js';
import { InvalidQueryError } from '../../domain/errors/DomainErrors.js';

export interface FTSRow {
  itemId: number;
  identifier: string;
  text: string;
}

export interface FTSHit {
  itemId: number;
  identifier: string;
  snippet: string;
  rank: number;
}

/**
 * FTS5 adapter：items_fts 是 external content 表（content='items'），
 * snippet() 會回頭讀 items.text；索引本身必須由呼叫端與 items 同步維護。
 * 欄位權重：identifier=0.5, text=1
 */
export class FTS5Adapter {
  constructor(private readonly db: Database.Database) {}

  insertRow(row: FTSRow): void {
    this.db.prepare(
      'INSERT INTO items_fts(rowid, identifier, text) VALUES(?, ?, ?)'
    ).run(row.itemId, row.identifier, row.text);
  }

  /** external content 表的刪除必須帶上「索引當時的」欄位值 */
  deleteRow(row: FTSRow): void {
    this.db.prepare(
      "INSERT INTO items_fts(items_fts, rowid, identifier, text) VALUES('delete', ?, ?, ?)"
    ).run(row.itemId, row.identifier, row.text);
  }

  /**
   * BM25 搜尋，rank 已翻轉為「越大越好」（原始 bm25() 越小越好）
   * raw=true 時把 query 當 FTS5 語法直接送出
   */
  search(query: string, topK: number, snippet: SnippetOptions, raw = false): FTSHit[] {
    const match = raw ? query.trim() : this.sanitizeQuery(query);
    if (!match) return [];

    const stmt = this.db.prepare<
      [string, string, string, number, string, number],
      { item_id: number; identifier: string; snippet: string; score: number }
    >(`
      SELECT items.item_id AS item_id,
             items.identifier AS identifier,
             snippet(items_fts, 1, ?, ?, ?, ?) AS snippet,
             bm25(items_fts, 0.5, 1.0) AS score
      FROM items_fts
      JOIN items ON items.item_id = items_fts.rowid
      WHERE items_fts MATCH ?
      ORDER BY score, items.item_id
      LIMIT ?
    `);

    let rows: Array<{ item_id: number; identifier: string; snippet: string; score: number }>;
    try {
      rows = stmt.all(snippet.open, snippet.close, snippet.ellipsis, snippet.tokens, match, topK);
    } catch (err) {
      // raw 查詢的語法錯誤在執行時才會由 FTS5 回報
      if (raw && err instanceof Database.SqliteError && err.code === 'SQLITE_ERROR') {
        throw new InvalidQueryError(query, err.message, { cause: err });
      }
      throw err;
    }

    return rows.map((row) => ({
      itemId: row.item_id,
      identifier: row.identifier,
      snippet: row.snippet,
      rank: -row.score,
    }));
  }

  /**
   * 比對索引與 items 表內容；不一致時回傳 SQLite 的錯誤訊息
   */
  integrityCheck(): { ok: true } | { ok: false; message: string } {
    try {
      this.db.prepare("INSERT INTO items_fts(items_fts, rank) VALUES('integrity-check', 1)").run();
      return { ok: true };
    } catch (err) {
      if (err instanceof Database.SqliteError && err.code.startsWith('SQLITE_CORRUPT')) {
        return { ok: false, message: err.message };
      }
      throw err;
    }
  }

  /** 依 items 表重建整個索引 */
  rebuild(): void {
    this.db.prepare("INSERT INTO items_fts(items_fts) VALUES('rebuild')").run();
  }

  /**
   * 消毒 FTS5 查詢：將每個 token 用雙引號包裹，
   * 避免 FTS5 特殊字元（如 - 被視為 NOT）造成語法錯誤
   */
  private sanitizeQuery(query: string): string {
    return query
      .split(/\s+/)
      .filter(Boolean)
      .map((token) => `"${token.replace(/"/g, '""')}"`)
      .join(' ');
  }
}
