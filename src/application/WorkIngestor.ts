import type { BibliographicPort } from '../domain/ports/BibliographicPort.js';
import type { Work } from '../domain/entities/Work.js';
import type { Outcome } from '../domain/value-objects/Outcome.js';
import type { IngestUseCase, SubmitOptions } from './IngestUseCase.js';
import { workToCandidate } from '../infrastructure/openalex/WorkFormatter.js';

/** OpenAlex work record → candidate → submit，filter 同步與 add 共用 */
export class WorkIngestor {
  constructor(
    private readonly bibliographic: BibliographicPort,
    private readonly ingest: IngestUseCase,
  ) {}

  async ingestWork(work: Work, options: SubmitOptions = {}): Promise<Outcome> {
    return this.ingest.submit(workToCandidate(work), options);
  }

  /** 逐頁取回 filter 的所有結果並 submit */
  async ingestQuery(filter: string, options: SubmitOptions = {}): Promise<Outcome[]> {
    const outcomes: Outcome[] = [];
    for await (const page of this.bibliographic.queryWorks(filter, { signal: options.signal })) {
      for (const work of page.works) {
        options.signal?.throwIfAborted();
        outcomes.push(await this.ingestWork(work, options));
      }
    }
    return outcomes;
  }

  async ingestIds(ids: readonly string[], options: SubmitOptions = {}): Promise<Outcome[]> {
    if (ids.length === 0) return [];
    const works = await this.bibliographic.getWorksByIds(ids, options.signal);
    const outcomes: Outcome[] = [];
    for (const work of works) {
      options.signal?.throwIfAborted();
      outcomes.push(await this.ingestWork(work, options));
    }
    return outcomes;
  }
}
