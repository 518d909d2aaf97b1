import { z } from 'zod';
import { ExternalServiceError, MissingConfigError, NotFoundError } from '../../domain/errors/DomainErrors.js';
import { withRetry, isRetryableError } from '../../shared/RetryPolicy.js';
import { Logger } from '../../shared/Logger.js';
import { fetchJson } from '../http/fetchJson.js';

export const UNPAYWALL_BASE_URL = 'https://api.unpaywall.org/v2';

export interface UnpaywallClientConfig {
  baseUrl?: string;
  /** Unpaywall 每個請求都必須帶 email */
  email?: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs?: number;
}

const OaLocationSchema = z.object({
  url_for_pdf: z.string().nullish(),
  url_for_landing_page: z.string().nullish(),
});

export const UnpaywallRecordSchema = z.object({
  doi: z.string(),
  title: z.string().nullish(),
  journal_name: z.string().nullish(),
  is_oa: z.boolean(),
  oa_locations: z.array(OaLocationSchema).default([]),
});

export type UnpaywallRecord = z.infer<typeof UnpaywallRecordSchema>;

/** 接受 https://doi.org/ 前綴或 doi: 前綴 */
export function normalizeDoi(doi: string): string {
  return doi.trim().replace(/^https?:\/\/(dx\.)?doi\.org\//i, '').replace(/^doi:/i, '');
}

/** 標題與期刊一行，OA 狀態一行，之後每個 OA 位置一行（優先 PDF） */
export function formatOpenAccess(record: UnpaywallRecord): string {
  const lines = [
    `${record.title ?? ''}, ${record.journal_name ?? ''}`,
    `Is open access: ${record.is_oa}`,
  ];
  for (const location of record.oa_locations) {
    const url = location.url_for_pdf ?? location.url_for_landing_page;
    if (url) lines.push(url);
  }
  return lines.join('\n');
}

/**
 * Unpaywall REST client：依 DOI 查詢開放取用版本
 * 重試策略與 OpenAlexClient 相同
 */
export class UnpaywallClient {
  private readonly logger = new Logger('UnpaywallClient');

  constructor(
    private readonly config: UnpaywallClientConfig,
    private readonly fetchFn: typeof fetch = globalThis.fetch,
  ) {}

  async lookup(doi: string, signal?: AbortSignal): Promise<UnpaywallRecord> {
    const email = this.config.email;
    if (!email) throw new MissingConfigError('openalex.email');

    const id = normalizeDoi(doi);
    const base = this.config.baseUrl ?? UNPAYWALL_BASE_URL;
    const url = new URL(`${base.endsWith('/') ? base : `${base}/`}${id.split('/').map(encodeURIComponent).join('/')}`);
    url.searchParams.set('email', email);

    try {
      return await withRetry(() => fetchJson({
        service: 'unpaywall',
        label: 'Unpaywall',
        url: url.toString(),
        schema: UnpaywallRecordSchema,
        timeoutMs: this.config.timeoutMs,
        fetchFn: this.fetchFn,
        signal,
      }), {
        maxRetries: this.config.maxRetries,
        baseDelayMs: this.config.retryBaseDelayMs ?? 1000,
        isRetryable: isRetryableError,
        signal,
        onRetry: (attempt, err) => this.logger.warn('Retrying Unpaywall request', { attempt, doi: id, error: err }),
      });
    } catch (err) {
      if (err instanceof ExternalServiceError && err.status === 404) {
        throw new NotFoundError('work', id, { cause: err });
      }
      throw err;
    }
  }
}
