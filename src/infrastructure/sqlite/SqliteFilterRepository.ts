import type Database from 'better-sqlite3';
import type { FilterPort } from '../../domain/ports/FilterPort.js';
import type { Filter } from '../../domain/entities/Filter.js';
import type { Watermark } from '../../domain/value-objects/Watermark.js';

interface FilterRow {
  filter_id: number;
  query: string;
  description: string | null;
  watermark: string | null;
  created_at: number;
}

function toFilter(row: FilterRow): Filter {
  return {
    filterId: row.filter_id,
    query: row.query,
    description: row.description,
    watermark: row.watermark,
    createdAt: row.created_at,
  };
}

export class SqliteFilterRepository implements FilterPort {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => number = Date.now,
  ) {}

  add(query: string, description?: string): { filter: Filter; created: boolean } {
    const result = this.db.prepare(`
      INSERT INTO filters(query, description, watermark, created_at)
      VALUES(?, ?, NULL, ?)
      ON CONFLICT(query) DO NOTHING
    `).run(query, description ?? null, this.now());

    const filter = this.get(query);
    if (!filter) throw new Error(`Filter "${query}" missing after insert`);
    return { filter, created: result.changes > 0 };
  }

  remove(query: string): boolean {
    return this.db.prepare('DELETE FROM filters WHERE query = ?').run(query).changes > 0;
  }

  get(query: string): Filter | undefined {
    const row = this.db.prepare<[string], FilterRow>(
      'SELECT filter_id, query, description, watermark, created_at FROM filters WHERE query = ?'
    ).get(query);
    return row ? toFilter(row) : undefined;
  }

  list(): Filter[] {
    return this.db.prepare<[], FilterRow>(
      'SELECT filter_id, query, description, watermark, created_at FROM filters ORDER BY filter_id'
    ).all().map(toFilter);
  }

  /** YYYY-MM-DD 可直接字串比較；條件式更新保證 watermark 不倒退 */
  advanceWatermark(query: string, watermark: Watermark): boolean {
    return this.db.prepare(`
      UPDATE filters SET watermark = ?
      WHERE query = ? AND (watermark IS NULL OR watermark < ?)
    `).run(watermark, query, watermark).changes > 0;
  }
}
