import type { z } from 'zod';
import { ExternalServiceError, RateLimitError, errorMessage } from '../../domain/errors/DomainErrors.js';
import type { ExternalService } from '../../domain/errors/DomainErrors.js';

export interface FetchJsonOptions<S extends z.ZodTypeAny> {
  service: ExternalService;
  /** 錯誤訊息中的服務名稱 */
  label: string;
  url: string;
  /** 錯誤訊息顯示的網址，需遮蔽金鑰時由呼叫端提供 */
  displayUrl?: string;
  schema: S;
  timeoutMs: number;
  fetchFn: typeof fetch;
  signal?: AbortSignal;
}

export function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) ? seconds * 1000 : undefined;
}

/**
 * GET 一個 JSON 端點並以 zod 驗證
 * 429 → RateLimitError；其他失敗 → ExternalServiceError（無 status 或 5xx 可重試）
 * 呼叫端的 signal 中止時原樣拋出
 */
export async function fetchJson<S extends z.ZodTypeAny>(options: FetchJsonOptions<S>): Promise<z.output<S>> {
  const { service, label, url, schema, signal } = options;
  const shown = options.displayUrl ?? url;
  const timeout = AbortSignal.timeout(options.timeoutMs);

  let response: Response;
  try {
    response = await options.fetchFn(url, {
      headers: { Accept: 'application/json' },
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    });
  } catch (err) {
    if (signal?.aborted) throw err;
    throw new ExternalServiceError(service, `${label} request failed: ${errorMessage(err)}`, undefined, { cause: err });
  }

  if (response.status === 429) {
    throw new RateLimitError(service, parseRetryAfter(response.headers.get('retry-after')));
  }
  if (!response.ok) {
    throw new ExternalServiceError(service, `${label} returned ${response.status} for ${shown}`, response.status);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (err) {
    if (signal?.aborted) throw err;
    throw new ExternalServiceError(
      service,
      `Unreadable ${label} response for ${shown}: ${errorMessage(err)}`,
      response.status,
      { cause: err },
    );
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ExternalServiceError(
      service,
      `Unexpected ${label} response for ${shown}: ${parsed.error.message}`,
      response.status,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}
