export const PRAGMA_SQL = `
PRAGMA journal_mode = WAL;
PRAGMA busy_timeout = 5000;
PRAGMA synchronous = NORMAL;
PRAGMA foreign_keys = ON;
PRAGMA cache_size = -64000;
`;

export const SCHEMA_VERSION = '1';

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS items (
  item_id INTEGER PRIMARY KEY AUTOINCREMENT,
  identifier TEXT NOT NULL UNIQUE,
  text TEXT NOT NULL CHECK(length(text) > 0),
  metadata_json TEXT,
  content_hash TEXT NOT NULL,
  added_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE VIRTUAL TABLE IF NOT EXISTS items_fts USING fts5(
  identifier,
  text,
  content='items',
  content_rowid='item_id',
  tokenize='porter unicode61 remove_diacritics 2'
);

CREATE TABLE IF NOT EXISTS filters (
  filter_id INTEGER PRIMARY KEY,
  query TEXT NOT NULL UNIQUE,
  description TEXT,
  watermark TEXT,
  created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS directories (
  directory_id INTEGER PRIMARY KEY,
  path TEXT NOT NULL UNIQUE,
  last_scanned INTEGER
);

CREATE INDEX IF NOT EXISTS idx_items_added_at ON items(added_at);
`;

/**
 * sqlite-vec 的 vec0 虛擬表需要在 extension 載入後才能建立
 * dimension 由設定決定；距離採 cosine，rowid 與 items.item_id 對齊
 */
export function vecTableSQL(dimension: number): string {
  return `CREATE VIRTUAL TABLE IF NOT EXISTS items_vec USING vec0(embedding float[${dimension}] distance_metric=cosine);`;
}
