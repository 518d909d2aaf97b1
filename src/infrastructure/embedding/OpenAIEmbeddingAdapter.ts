import OpenAI from 'openai';
import type { EmbeddingPort, EmbeddingResult } from '../../domain/ports/EmbeddingPort.js';
import { ExternalServiceError, RateLimitError, errorMessage } from '../../domain/errors/DomainErrors.js';

export interface OpenAIEmbeddingConfig {
  apiKey: string;
  model?: string;
  dimension?: number;
  baseUrl?: string;
  timeoutMs?: number;
}

/** Retry-After 可能是秒數或 HTTP 日期 */
function parseRetryAfter(value: string | null | undefined): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return seconds * 1000;
  const at = Date.parse(value);
  return Number.isNaN(at) ? undefined : Math.max(0, at - Date.now());
}

/** 將 openai SDK 的錯誤轉成 domain error */
export function toServiceError(
  service: 'embedding' | 'completion',
  err: unknown,
): ExternalServiceError {
  if (err instanceof OpenAI.APIError) {
    if (err.status === 429) {
      return new RateLimitError(service, parseRetryAfter(err.headers?.['retry-after']), { cause: err });
    }
    return new ExternalServiceError(service, `${service} request failed: ${err.message}`, err.status, { cause: err });
  }
  return new ExternalServiceError(service, `${service} request failed: ${errorMessage(err)}`, undefined, { cause: err });
}

/**
 * OpenAI-compatible /embeddings adapter
 * SDK 內建重試關閉，重試由 EmbeddingGateway 統一處理
 */
export class OpenAIEmbeddingAdapter implements EmbeddingPort {
  readonly providerId = 'openai';
  readonly dimension: number;
  readonly modelId: string;
  private readonly client: OpenAI;

  constructor(config: OpenAIEmbeddingConfig) {
    this.dimension = config.dimension ?? 1536;
    this.modelId = config.model ?? 'text-embedding-3-small';
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
      timeout: config.timeoutMs ?? 60000,
    });
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<EmbeddingResult[]> {
    if (texts.length === 0) return [];

    try {
      const response = await this.client.embeddings.create({
        model: this.modelId,
        input: texts,
        encoding_format: 'float',
      }, { signal });

      return response.data
        .slice()
        .sort((a, b) => a.index - b.index)
        .map((item) => ({
          vector: new Float32Array(item.embedding),
          tokensUsed: response.usage?.total_tokens ?? 0,
        }));
    } catch (err) {
      throw toServiceError('embedding', err);
    }
  }

  async embedOne(text: string, signal?: AbortSignal): Promise<EmbeddingResult> {
    const [result] = await this.embed([text], signal);
    if (!result) {
      throw new ExternalServiceError('embedding', 'Embedding service returned no vectors', 502);
    }
    return result;
  }
}
