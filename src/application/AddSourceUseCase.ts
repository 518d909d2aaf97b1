import type { BibliographicPort } from '../domain/ports/BibliographicPort.js';
import type { FileSystemPort } from '../domain/ports/FileSystemPort.js';
import type { WebPagePort } from '../domain/ports/WebPagePort.js';
import type { Outcome } from '../domain/value-objects/Outcome.js';
import type { HtmlExtractor } from '../infrastructure/extraction/HtmlExtractor.js';
import type { IngestUseCase, ExistingPolicy } from './IngestUseCase.js';
import type { FileIngestor } from './FileIngestor.js';
import type { WorkIngestor } from './WorkIngestor.js';
import { NotFoundError } from '../domain/errors/DomainErrors.js';
import { doiUrl, orcidUrl, shortOpenAlexId } from './FilterSyncUseCase.js';

export type SourceKind = 'doi' | 'orcid' | 'url' | 'file';

export interface AddOptions {
  /** 一併收錄參考文獻 */
  references?: boolean;
  /** 一併收錄引用此論文的作品 */
  citing?: boolean;
  /** 一併收錄 OpenAlex 的相關作品 */
  related?: boolean;
  onExisting?: ExistingPolicy;
  signal?: AbortSignal;
}

const ORCID_PATTERN = /^\d{4}-\d{4}-\d{4}-\d{3}[\dX]$/;

/**
 * 判斷來源種類：
 * - 10.* 或含 doi.org → DOI
 * - orcid.org URL 或裸 ORCID → 作者
 * - http(s):// → 網頁
 * - 其餘視為檔案路徑
 */
export function classifySource(source: string): SourceKind {
  if (source.startsWith('10.') || source.includes('doi.org/')) return 'doi';
  if (source.includes('orcid.org/') || ORCID_PATTERN.test(source)) return 'orcid';
  if (/^https?:\/\//i.test(source)) return 'url';
  return 'file';
}

/** 一次性收錄：DOI、ORCID、網頁或檔案 */
export class AddSourceUseCase {
  constructor(
    private readonly bibliographic: BibliographicPort,
    private readonly works: WorkIngestor,
    private readonly files: FileIngestor,
    private readonly ingest: IngestUseCase,
    private readonly fs: FileSystemPort,
    private readonly web: WebPagePort,
    private readonly html: HtmlExtractor,
  ) {}

  async add(source: string, options: AddOptions = {}): Promise<Outcome[]> {
    const submit = { onExisting: options.onExisting, signal: options.signal };
    const trimmed = source.trim();

    switch (classifySource(trimmed)) {
      case 'doi':
        return this.addWork(doiUrl(trimmed), options);
      case 'orcid':
        return this.works.ingestQuery(`author.orcid:${orcidUrl(trimmed)}`, submit);
      case 'url': {
        const page = this.html.extractHtml(await this.web.fetchHtml(trimmed, options.signal));
        return [await this.ingest.submit({ identifier: trimmed, ...page }, submit)];
      }
      case 'file': {
        if (!(await this.fs.fileExists(trimmed))) throw new NotFoundError('file', trimmed);
        const canonical = await this.fs.canonicalPath(trimmed);
        return [await this.files.ingestFile(canonical, submit)];
      }
    }
  }

  private async addWork(id: string, options: AddOptions): Promise<Outcome[]> {
    const submit = { onExisting: options.onExisting, signal: options.signal };
    const work = await this.bibliographic.getWork(id, options.signal);
    const outcomes = [await this.works.ingestWork(work, submit)];

    if (options.references) {
      outcomes.push(...await this.works.ingestIds(work.referenced_works, submit));
    }
    if (options.citing) {
      outcomes.push(...await this.works.ingestQuery(`cites:${shortOpenAlexId(work.id)}`, submit));
    }
    if (options.related) {
      outcomes.push(...await this.works.ingestIds(work.related_works, submit));
    }
    return outcomes;
  }
}
