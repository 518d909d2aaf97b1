import type Database from 'better-sqlite3';
import type { FTS5Adapter } from '../infrastructure/sqlite/FTS5Adapter.js';
import type { SqliteVecAdapter } from '../infrastructure/sqlite/SqliteVecAdapter.js';
import type { EmbeddingGateway } from '../infrastructure/embedding/EmbeddingGateway.js';

export interface HealthCheckOptions {
  fix?: boolean;
}

export interface HealthReport {
  healthy: boolean;
  totalItems: number;
  totalVectors: number;
  /** 沒有 vec row 的 item */
  missingVectors: string[];
  /** 對應不到 item 的 vec rowid */
  orphanedVectorIds: number[];
  ftsConsistent: boolean;
  ftsIssues: string[];
  fixActions: string[];
}

/**
 * 健康檢查用例：驗證 items 與兩個索引的一致性，可選修復模式
 *
 * 檢查項目：
 * 1. 每個 item 都有 vec row，且沒有孤兒 vec row
 * 2. FTS5 integrity-check（與 items 表內容比對）
 *
 * 修復項目（fix=true）：
 * 1. 重新 embedding 缺少向量的 item
 * 2. 刪除孤兒 vec row
 * 3. 重建 FTS5 索引
 */
export class HealthCheckUseCase {
  constructor(
    private readonly db: Database.Database,
    private readonly vec: SqliteVecAdapter,
    private readonly fts5: FTS5Adapter,
    private readonly embedding: EmbeddingGateway,
  ) {}

  async check(options: HealthCheckOptions = {}): Promise<HealthReport> {
    const fixActions: string[] = [];

    const items = this.db.prepare<[], { item_id: number; identifier: string }>(
      'SELECT item_id, identifier FROM items ORDER BY item_id'
    ).all();
    const vectorIds = new Set(this.vec.listRowIds());
    const itemIds = new Set(items.map((i) => i.item_id));

    const missing = items.filter((i) => !vectorIds.has(i.item_id));
    const orphanedVectorIds = [...vectorIds].filter((id) => !itemIds.has(id)).sort((a, b) => a - b);

    const fts = this.fts5.integrityCheck();
    const ftsConsistent = fts.ok;
    const ftsIssues = fts.ok ? [] : [fts.message];

    if (options.fix) {
      if (missing.length > 0) {
        await this.reembed(missing.map((m) => m.item_id));
        fixActions.push(`Re-embedded ${missing.length} items missing vectors`);
      }
      if (orphanedVectorIds.length > 0) {
        this.db.transaction(() => {
          for (const id of orphanedVectorIds) this.vec.deleteRow(id);
        })();
        fixActions.push(`Deleted ${orphanedVectorIds.length} orphaned vectors`);
      }
      if (!ftsConsistent) {
        this.fts5.rebuild();
        fixActions.push('Rebuilt FTS5 index');
      }
    }

    const healthy = missing.length === 0 && orphanedVectorIds.length === 0 && ftsConsistent;

    return {
      healthy,
      totalItems: items.length,
      totalVectors: vectorIds.size,
      missingVectors: missing.map((m) => m.identifier),
      orphanedVectorIds,
      ftsConsistent,
      ftsIssues,
      fixActions,
    };
  }

  /** embedding 在交易外取得，再一次寫入所有 vec row */
  private async reembed(itemIds: number[]): Promise<void> {
    const select = this.db.prepare<[number], { text: string }>('SELECT text FROM items WHERE item_id = ?');
    const texts = itemIds.map((id) => select.get(id)?.text ?? '');
    const vectors = await this.embedding.embedBatch(texts);

    this.db.transaction(() => {
      itemIds.forEach((id, i) => {
        const vector = vectors[i];
        if (vector) this.vec.insertRow(id, vector);
      });
    })();
  }
}
