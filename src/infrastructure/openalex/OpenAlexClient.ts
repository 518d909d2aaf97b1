import { z } from 'zod';
import type { BibliographicPort, EntitySearchResult, WorksPage } from '../../domain/ports/BibliographicPort.js';
import { AuthorHintSchema, AuthorSchema, WorkSchema } from '../../domain/entities/Work.js';
import type { Author, AuthorHint, Work } from '../../domain/entities/Work.js';
import { ExternalServiceError, NotFoundError } from '../../domain/errors/DomainErrors.js';
import type { NotFoundKind } from '../../domain/errors/DomainErrors.js';
import { withRetry, isRetryableError } from '../../shared/RetryPolicy.js';
import { Logger } from '../../shared/Logger.js';
import { fetchJson } from '../http/fetchJson.js';

export interface OpenAlexClientConfig {
  baseUrl: string;
  /** 加入 polite pool 的 mailto */
  email?: string;
  apiKey?: string;
  perPage: number;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs?: number;
}

/** openalex_id 篩選一次最多帶的 id 數 */
export const MAX_IDS_PER_FILTER = 50;

const MetaSchema = z.object({
  count: z.number().int(),
  next_cursor: z.string().nullish(),
}).passthrough();

const WorksResponseSchema = z.object({
  meta: MetaSchema,
  results: z.array(WorkSchema),
});

const EntitiesResponseSchema = z.object({
  meta: MetaSchema,
  results: z.array(z.record(z.unknown())),
});

const AutocompleteResponseSchema = z.object({
  results: z.array(AuthorHintSchema),
});

/**
 * OpenAlex REST client（fetch + zod）
 * 429 與 5xx 以指數退避重試；呼叫端的 AbortSignal 中止時直接拋出，不重試
 */
export class OpenAlexClient implements BibliographicPort {
  private readonly logger = new Logger('OpenAlexClient');

  constructor(
    private readonly config: OpenAlexClientConfig,
    private readonly fetchFn: typeof fetch = globalThis.fetch,
  ) {}

  async *queryWorks(filter: string, options: { signal?: AbortSignal } = {}): AsyncIterable<WorksPage> {
    let cursor: string | null | undefined = '*';
    while (cursor) {
      const page: z.infer<typeof WorksResponseSchema> = await this.getJson('works', {
        filter,
        'per-page': String(this.config.perPage),
        cursor,
      }, WorksResponseSchema, options.signal);

      yield { works: page.results, totalCount: page.meta.count };

      if (page.results.length === 0) break;
      cursor = page.meta.next_cursor;
    }
  }

  async getWork(id: string, signal?: AbortSignal): Promise<Work> {
    return this.getEntity('works', 'work', id, WorkSchema, signal);
  }

  async getWorksByIds(ids: readonly string[], signal?: AbortSignal): Promise<Work[]> {
    const works: Work[] = [];
    for (let i = 0; i < ids.length; i += MAX_IDS_PER_FILTER) {
      const chunk = ids.slice(i, i + MAX_IDS_PER_FILTER);
      for await (const page of this.queryWorks(`openalex_id:${chunk.join('|')}`, { signal })) {
        works.push(...page.works);
      }
    }
    return works;
  }

  async getAuthor(id: string, signal?: AbortSignal): Promise<Author> {
    return this.getEntity('authors', 'author', id, AuthorSchema, signal);
  }

  async autocompleteAuthors(query: string, signal?: AbortSignal): Promise<AuthorHint[]> {
    const data = await this.getJson('autocomplete/authors', { q: query }, AutocompleteResponseSchema, signal);
    return data.results;
  }

  async searchEntities(endpoint: string, filter: string, signal?: AbortSignal): Promise<EntitySearchResult> {
    const data = await this.getJson(endpoint, {
      filter,
      'per-page': String(this.config.perPage),
    }, EntitiesResponseSchema, signal);
    return { totalCount: data.meta.count, results: data.results };
  }

  private async getEntity<S extends z.ZodTypeAny>(
    endpoint: string,
    kind: NotFoundKind,
    id: string,
    schema: S,
    signal?: AbortSignal,
  ): Promise<z.output<S>> {
    try {
      return await this.getJson(`${endpoint}/${encodeURI(id)}`, {}, schema, signal);
    } catch (err) {
      if (err instanceof ExternalServiceError && err.status === 404) {
        throw new NotFoundError(kind, id, { cause: err });
      }
      throw err;
    }
  }

  private buildUrl(path: string, params: Record<string, string>): string {
    const url = new URL(path, this.config.baseUrl.endsWith('/') ? this.config.baseUrl : `${this.config.baseUrl}/`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    if (this.config.email) url.searchParams.set('mailto', this.config.email);
    if (this.config.apiKey) url.searchParams.set('api_key', this.config.apiKey);
    return url.toString();
  }

  private async getJson<S extends z.ZodTypeAny>(
    path: string,
    params: Record<string, string>,
    schema: S,
    signal?: AbortSignal,
  ): Promise<z.output<S>> {
    const url = this.buildUrl(path, params);
    return withRetry(() => this.request(url, schema, signal), {
      maxRetries: this.config.maxRetries,
      baseDelayMs: this.config.retryBaseDelayMs ?? 1000,
      isRetryable: isRetryableError,
      signal,
      onRetry: (attempt, err) => this.logger.warn('Retrying OpenAlex request', { attempt, path, error: err }),
    });
  }

  private async request<S extends z.ZodTypeAny>(
    url: string,
    schema: S,
    signal?: AbortSignal,
  ): Promise<z.output<S>> {
    return fetchJson({
      service: 'openalex',
      label: 'OpenAlex',
      url,
      displayUrl: this.redact(url),
      schema,
      timeoutMs: this.config.timeoutMs,
      fetchFn: this.fetchFn,
      signal,
    });
  }

  /** 錯誤訊息中不帶 api_key */
  private redact(url: string): string {
    const parsed = new URL(url);
    if (parsed.searchParams.has('api_key')) parsed.searchParams.set('api_key', '***');
    return parsed.toString();
  }
}
