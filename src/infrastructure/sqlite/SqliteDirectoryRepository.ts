import type Database from 'better-sqlite3';
import type { DirectoryPort } from '../../domain/ports/DirectoryPort.js';
import type { WatchedDirectory } from '../../domain/entities/WatchedDirectory.js';

interface DirectoryRow {
  directory_id: number;
  path: string;
  last_scanned: number | null;
}

function toDirectory(row: DirectoryRow): WatchedDirectory {
  return { directoryId: row.directory_id, path: row.path, lastScanned: row.last_scanned };
}

export class SqliteDirectoryRepository implements DirectoryPort {
  constructor(private readonly db: Database.Database) {}

  get(path: string): WatchedDirectory | undefined {
    const row = this.db.prepare<[string], DirectoryRow>(
      'SELECT directory_id, path, last_scanned FROM directories WHERE path = ?'
    ).get(path);
    return row ? toDirectory(row) : undefined;
  }

  list(): WatchedDirectory[] {
    return this.db.prepare<[], DirectoryRow>(
      'SELECT directory_id, path, last_scanned FROM directories ORDER BY path'
    ).all().map(toDirectory);
  }

  markScanned(path: string, scannedAt: number): WatchedDirectory {
    this.db.prepare(`
      INSERT INTO directories(path, last_scanned) VALUES(?, ?)
      ON CONFLICT(path) DO UPDATE SET last_scanned = excluded.last_scanned
    `).run(path, scannedAt);

    const directory = this.get(path);
    if (!directory) throw new Error(`Directory "${path}" missing after upsert`);
    return directory;
  }
}
