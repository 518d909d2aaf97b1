import fs from 'node:fs';
import type Database from 'better-sqlite3';
import { isValid, parseISO, subDays, subMonths, subWeeks, subYears } from 'date-fns';
import type { CorpusPort } from '../domain/ports/CorpusPort.js';
import type { FilterPort } from '../domain/ports/FilterPort.js';
import type { DirectoryPort } from '../domain/ports/DirectoryPort.js';
import type { CorpusItem } from '../domain/entities/CorpusItem.js';
import { NotFoundError } from '../domain/errors/DomainErrors.js';
import { storedWork, toBibtex, toCitation } from '../infrastructure/openalex/WorkFormatter.js';
import { formatBibtexEntry } from '../infrastructure/extraction/BibtexParser.js';

const RELATIVE_SINCE = /^(\d+)\s+(day|week|month|year)s?\s+ago$/i;

/**
 * 解析 review 的起始時間：ISO 日期，或「<n> day(s)|week(s)|month(s)|year(s) ago」
 */
export function parseSince(value: string, now: Date = new Date()): Date {
  const trimmed = value.trim();
  const relative = RELATIVE_SINCE.exec(trimmed);
  if (relative) {
    const amount = Number(relative[1]);
    switch (relative[2].toLowerCase()) {
      case 'day': return subDays(now, amount);
      case 'week': return subWeeks(now, amount);
      case 'month': return subMonths(now, amount);
      default: return subYears(now, amount);
    }
  }

  const parsed = parseISO(trimmed);
  if (!isValid(parsed)) {
    throw new RangeError(`Unrecognized date "${value}" (use YYYY-MM-DD or "<n> weeks ago")`);
  }
  return parsed;
}

export interface AboutReport {
  databasePath: string;
  sizeBytes: number;
  itemCount: number;
  filterCount: number;
  directoryCount: number;
}

export type SqlResult =
  | { kind: 'rows'; rows: unknown[] }
  | { kind: 'changes'; changes: number };

/** 對已存資料的報表與匯出：review、bibtex、citation、about、sql */
export class ReportingUseCase {
  constructor(
    private readonly db: Database.Database,
    private readonly dbPath: string,
    private readonly corpus: CorpusPort,
    private readonly filters: FilterPort,
    private readonly directories: DirectoryPort,
    private readonly now: () => Date = () => new Date(),
  ) {}

  review(since = '1 week ago'): CorpusItem[] {
    return this.corpus.listAddedSince(parseSince(since, this.now()).getTime());
  }

  bibtex(identifier: string): string {
    const item = this.require(identifier);
    const work = storedWork(item.metadata);
    if (work) return toBibtex(work);

    if (item.metadata.bibtex && item.metadata.bibtex.length > 0) {
      return item.metadata.bibtex.map(formatBibtexEntry).join('\n\n');
    }

    const title = item.metadata.title ?? identifier;
    return `@misc{item-${item.itemId},\n  title = {${title}},\n  url = {${identifier}},\n}`;
  }

  citation(identifier: string): string {
    const item = this.require(identifier);
    if (item.metadata.citation) return item.metadata.citation;
    const work = storedWork(item.metadata);
    if (work) return toCitation(work);
    return item.metadata.title ? `${item.metadata.title}, ${identifier}` : identifier;
  }

  about(): AboutReport {
    const sizeBytes = this.dbPath === ':memory:' || !fs.existsSync(this.dbPath)
      ? 0
      : fs.statSync(this.dbPath).size;
    return {
      databasePath: this.dbPath,
      sizeBytes,
      itemCount: this.corpus.count(),
      filterCount: this.filters.list().length,
      directoryCount: this.directories.list().length,
    };
  }

  /** 直接執行 SQL：查詢回傳 rows，其餘回傳受影響筆數 */
  sql(statement: string): SqlResult {
    const stmt = this.db.prepare(statement);
    if (stmt.reader) {
      return { kind: 'rows', rows: stmt.all() };
    }
    return { kind: 'changes', changes: stmt.run().changes };
  }

  private require(identifier: string): CorpusItem {
    const item = this.corpus.get(identifier);
    if (!item) throw new NotFoundError('item', identifier);
    return item;
  }
}
