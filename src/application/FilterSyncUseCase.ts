import type { FilterPort } from '../domain/ports/FilterPort.js';
import type { BibliographicPort } from '../domain/ports/BibliographicPort.js';
import type { Filter, FilterSyncState } from '../domain/entities/Filter.js';
import type { BatchReport } from '../domain/value-objects/Outcome.js';
import type { Watermark } from '../domain/value-objects/Watermark.js';
import type { FilterSyncReport } from './dto/FilterSyncReport.js';
import type { WorkIngestor } from './WorkIngestor.js';
import { summarize, toFailureRecord } from '../domain/value-objects/Outcome.js';
import { maxWatermark, toWatermark, watermarkOf } from '../domain/value-objects/Watermark.js';
import { EmptyInputError, LitdbError, NotFoundError, errorMessage } from '../domain/errors/DomainErrors.js';
import { Logger } from '../shared/Logger.js';

export interface FilterSyncOptions {
  /** 附加到 filter 的日期欄位，例如 from_created_date */
  sinceFilter: string;
}

/** follow / watch / citing / related 的結果 */
export interface SavedFilterResult {
  filter: Filter;
  created: boolean;
  /** follow 時先收錄的作者著作 */
  ingested?: BatchReport;
  /** watch 時驗證查詢取得的命中數 */
  matched?: number;
}

export function orcidUrl(orcid: string): string {
  return orcid.startsWith('http') ? orcid : `https://orcid.org/${orcid}`;
}

export function doiUrl(doi: string): string {
  return doi.startsWith('10.') ? `https://doi.org/${doi}` : doi;
}

/** https://openalex.org/W123 → W123 */
export function shortOpenAlexId(id: string): string {
  return id.replace(/^https?:\/\/openalex\.org\//, '');
}

/**
 * Filter 同步：對每個已存 filter 增量拉取新 work 並收錄
 *
 * 狀態機：idle → fetching →（每頁）committing → fetching … → idle
 * watermark 只在整個週期完成（所有頁面取回、未中止、沒有可重試的失敗）後才前進，
 * 否則維持原值，下次重做同一個時間窗；重複的 work 由 dedup 略過
 */
export class FilterSyncUseCase {
  private readonly logger = new Logger('FilterSyncUseCase');
  private readonly states = new Map<string, FilterSyncState>();

  constructor(
    private readonly filters: FilterPort,
    private readonly bibliographic: BibliographicPort,
    private readonly works: WorkIngestor,
    private readonly options: FilterSyncOptions,
    private readonly now: () => Date = () => new Date(),
  ) {}

  getState(query: string): FilterSyncState {
    return this.states.get(query) ?? 'idle';
  }

  addFilter(query: string, description?: string): { filter: Filter; created: boolean } {
    return this.filters.add(query.trim(), description);
  }

  removeFilter(query: string): boolean {
    return this.filters.remove(query.trim());
  }

  listFilters(): Filter[] {
    return this.filters.list();
  }

  /** 先收錄作者所有著作，再儲存 author.orcid filter（描述為作者名） */
  async follow(orcid: string, options: { signal?: AbortSignal } = {}): Promise<SavedFilterResult> {
    const url = orcidUrl(orcid);
    const query = `author.orcid:${url}`;
    const cycleStart = watermarkOf(this.now());

    const author = await this.bibliographic.getAuthor(url, options.signal);
    const outcomes = await this.works.ingestQuery(query, options);
    const ingested = summarize(outcomes);
    const { filter, created } = this.filters.add(query, author.display_name);

    // 已取回全部著作，沒有阻擋性失敗時直接把 watermark 設到今天
    const blocking = outcomes.some((o) => o.kind === 'failed' && !(o.error instanceof EmptyInputError));
    if (!blocking) this.filters.advanceWatermark(query, cycleStart);

    this.logger.info('Following author', { orcid: url, name: author.display_name, inserted: ingested.inserted });
    return { filter: this.filters.get(query) ?? filter, created, ingested };
  }

  unfollow(orcid: string): boolean {
    return this.filters.remove(`author.orcid:${orcidUrl(orcid)}`);
  }

  /** 先以一頁查詢驗證 filter，查無結果只警告，仍會儲存 */
  async watch(query: string, options: { signal?: AbortSignal } = {}): Promise<SavedFilterResult> {
    const trimmed = query.trim();
    const preview = await this.bibliographic.searchEntities('works', trimmed, options.signal);
    if (preview.totalCount === 0) {
      this.logger.warn('Filter matched no works', { query: trimmed });
    }
    const { filter, created } = this.filters.add(trimmed);
    return { filter, created, matched: preview.totalCount };
  }

  /** 儲存 cites:<work id> filter，追蹤引用此 DOI 的新論文 */
  async citing(doi: string, options: { signal?: AbortSignal } = {}): Promise<SavedFilterResult> {
    const query = await this.relationQuery('cites', doi, options.signal);
    return this.filters.add(query, `Citing papers for ${doi}`);
  }

  async removeCiting(doi: string, options: { signal?: AbortSignal } = {}): Promise<boolean> {
    return this.filters.remove(await this.relationQuery('cites', doi, options.signal));
  }

  /** 儲存 related_to:<work id> filter */
  async related(doi: string, options: { signal?: AbortSignal } = {}): Promise<SavedFilterResult> {
    const query = await this.relationQuery('related_to', doi, options.signal);
    return this.filters.add(query, `Related papers for ${doi}`);
  }

  async removeRelated(doi: string, options: { signal?: AbortSignal } = {}): Promise<boolean> {
    return this.filters.remove(await this.relationQuery('related_to', doi, options.signal));
  }

  async syncOne(filter: Filter, options: { signal?: AbortSignal } = {}): Promise<FilterSyncReport> {
    const { signal } = options;
    const query = filter.query;
    const current = this.filters.get(query);
    if (!current) throw new NotFoundError('filter', query);

    const cycleStart = watermarkOf(this.now());
    const before = current.watermark;
    const remote = before ? `${query},${this.options.sinceFilter}:${before}` : query;

    const report: FilterSyncReport = {
      query,
      newCount: 0,
      updatedCount: 0,
      skippedCount: 0,
      errors: [],
      watermarkBefore: before,
      watermarkAfter: before,
      advanced: false,
    };

    let newest: Watermark | null = null;
    let complete = false;
    let blocked = false;

    this.logger.info('Sync started', { query, watermark: before });
    this.states.set(query, 'fetching');
    try {
      for await (const page of this.bibliographic.queryWorks(remote, { signal })) {
        this.states.set(query, 'committing');
        for (const work of page.works) {
          signal?.throwIfAborted();
          newest = maxWatermark(newest, toWatermark(work.created_date));

          const outcome = await this.works.ingestWork(work, { signal });
          switch (outcome.kind) {
            case 'inserted': report.newCount++; break;
            case 'updated': report.updatedCount++; break;
            case 'skipped': report.skippedCount++; break;
            case 'failed':
              report.errors.push(toFailureRecord(outcome));
              // 空文字的 work 永遠存不進來，不因此卡住 watermark
              if (!(outcome.error instanceof EmptyInputError)) blocked = true;
              break;
          }
        }
        this.states.set(query, 'fetching');
      }
      complete = true;
    } catch (err) {
      if (signal?.aborted) {
        report.fetchError = { code: 'ABORTED', message: errorMessage(signal.reason ?? err) };
      } else if (err instanceof LitdbError) {
        report.fetchError = { code: err.code, message: err.message };
      } else {
        throw err;
      }
      this.logger.warn('Sync interrupted', { query, error: err });
    } finally {
      this.states.set(query, 'idle');
    }

    if (complete && !blocked && !signal?.aborted) {
      const next = maxWatermark(before, cycleStart, newest);
      if (next !== null) {
        report.advanced = this.filters.advanceWatermark(query, next);
      }
    }
    report.watermarkAfter = this.filters.get(query)?.watermark ?? report.watermarkAfter;

    this.logger.info('Sync finished', {
      query,
      inserted: report.newCount,
      skipped: report.skippedCount,
      failed: report.errors.length,
      watermark: report.watermarkAfter,
      advanced: report.advanced,
    });
    return report;
  }

  /** 依序同步每個 filter，單一 filter 的失敗不影響其他 filter */
  async syncAll(options: { signal?: AbortSignal } = {}): Promise<FilterSyncReport[]> {
    const reports: FilterSyncReport[] = [];
    for (const filter of this.filters.list()) {
      if (options.signal?.aborted) break;
      try {
        reports.push(await this.syncOne(filter, options));
      } catch (err) {
        this.logger.error('Sync failed', { query: filter.query, error: err });
        reports.push({
          query: filter.query,
          newCount: 0,
          updatedCount: 0,
          skippedCount: 0,
          errors: [],
          watermarkBefore: filter.watermark,
          watermarkAfter: filter.watermark,
          advanced: false,
          fetchError: {
            code: err instanceof LitdbError ? err.code : 'UNEXPECTED',
            message: errorMessage(err),
          },
        });
      }
    }
    return reports;
  }

  /** filter 需要 OpenAlex work id，先以 DOI 查出 */
  private async relationQuery(field: 'cites' | 'related_to', doi: string, signal?: AbortSignal): Promise<string> {
    const work = await this.bibliographic.getWork(doiUrl(doi), signal);
    return `${field}:${shortOpenAlexId(work.id)}`;
  }
}
