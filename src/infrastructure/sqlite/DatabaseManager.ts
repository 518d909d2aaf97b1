import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import { PRAGMA_SQL, SCHEMA_SQL, SCHEMA_VERSION, vecTableSQL } from './schema.js';
import { EmbeddingDimensionMismatchError } from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';

/**
 * SQLite 資料庫管理器（整個 process 只建立一個，結束時 close）
 *
 * 負責：初始化 DB、載入 sqlite-vec extension、執行 schema、
 * 記錄與驗證 embedding 維度（避免模型切換後維度不符）。
 */
export class DatabaseManager {
  private readonly db: Database.Database;
  private readonly logger = new Logger('DatabaseManager');

  constructor(
    private readonly dbPath: string,
    private readonly embeddingDimension: number = 1536,
  ) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);

    // 載入 sqlite-vec extension
    this.db.loadExtension(sqliteVec.getLoadablePath());

    // 設定 PRAGMA（逐行執行，因為 PRAGMA 不支援批次）
    for (const line of PRAGMA_SQL.trim().split('\n')) {
      const trimmed = line.trim();
      if (trimmed && !trimmed.startsWith('--')) {
        this.db.pragma(trimmed.replace('PRAGMA ', '').replace(';', ''));
      }
    }

    this.db.exec(SCHEMA_SQL);
    this.db.exec(vecTableSQL(this.embeddingDimension));

    this.db.prepare(
      "INSERT OR REPLACE INTO schema_meta(key, value) VALUES('version', ?)"
    ).run(SCHEMA_VERSION);

    this.validateEmbeddingDimension();

    this.logger.debug('Database initialized', { dbPath, embeddingDimension });
  }

  getDb(): Database.Database {
    return this.db;
  }

  getPath(): string {
    return this.dbPath;
  }

  close(): void {
    this.db.close();
  }

  /**
   * 首次使用時記錄維度到 schema_meta；之後維度不同就拒絕開啟，
   * 否則 vec0 會在第一次寫入時才失敗
   */
  private validateEmbeddingDimension(): void {
    const row = this.db.prepare<[], { value: string }>(
      "SELECT value FROM schema_meta WHERE key = 'embedding_dimension'"
    ).get();

    if (!row) {
      this.db.prepare(
        "INSERT OR REPLACE INTO schema_meta(key, value) VALUES('embedding_dimension', ?)"
      ).run(String(this.embeddingDimension));
      return;
    }

    const storedDimension = parseInt(row.value, 10);
    if (storedDimension !== this.embeddingDimension) {
      this.db.close();
      throw new EmbeddingDimensionMismatchError(storedDimension, this.embeddingDimension);
    }
  }
}
