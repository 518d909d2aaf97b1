import type { EmbeddingPort } from '../../domain/ports/EmbeddingPort.js';
import { ExternalServiceError } from '../../domain/errors/DomainErrors.js';
import { withRetry, isRetryableError } from '../../shared/RetryPolicy.js';
import { Logger } from '../../shared/Logger.js';

export interface EmbeddingGatewayOptions {
  maxBatchSize: number;
  /** 超過的部分在送出前截掉 */
  maxInputChars: number;
  maxRetries: number;
  retryBaseDelayMs: number;
}

const DEFAULT_OPTIONS: EmbeddingGatewayOptions = {
  maxBatchSize: 100,
  maxInputChars: 8000,
  maxRetries: 3,
  retryBaseDelayMs: 500,
};

/**
 * Embedding Gateway：在 EmbeddingPort 之上處理截斷、批次、重試與維度檢查
 * 不持有狀態，失敗一律以 ExternalServiceError / RateLimitError 拋出
 */
export class EmbeddingGateway {
  private readonly options: EmbeddingGatewayOptions;
  private readonly logger = new Logger('EmbeddingGateway');

  constructor(
    private readonly provider: EmbeddingPort,
    options: Partial<EmbeddingGatewayOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  get dimension(): number {
    return this.provider.dimension;
  }

  get modelId(): string {
    return this.provider.modelId;
  }

  async embedOne(text: string, signal?: AbortSignal): Promise<Float32Array> {
    const [vector] = await this.embedBatch([text], signal);
    if (!vector) {
      throw new ExternalServiceError('embedding', 'Embedding service returned no vectors', 502);
    }
    return vector;
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<Float32Array[]> {
    if (texts.length === 0) return [];

    const vectors: Float32Array[] = [];
    for (let i = 0; i < texts.length; i += this.options.maxBatchSize) {
      signal?.throwIfAborted();
      const batch = texts
        .slice(i, i + this.options.maxBatchSize)
        .map((t) => t.slice(0, this.options.maxInputChars));

      const results = await withRetry(() => this.provider.embed(batch, signal), {
        maxRetries: this.options.maxRetries,
        baseDelayMs: this.options.retryBaseDelayMs,
        isRetryable: isRetryableError,
        signal,
        onRetry: (attempt, err) => this.logger.warn('Retrying embedding request', { attempt, error: err }),
      });

      if (results.length !== batch.length) {
        throw new ExternalServiceError(
          'embedding',
          `Embedding service returned ${results.length} vectors for ${batch.length} inputs`,
          502,
        );
      }
      for (const result of results) {
        if (result.vector.length !== this.provider.dimension) {
          // 維度不符重試也不會變，以 4xx 狀態標為不可重試
          throw new ExternalServiceError(
            'embedding',
            `Embedding service returned ${result.vector.length} dimensions, expected ${this.provider.dimension}`,
            422,
          );
        }
        vectors.push(result.vector);
      }
    }
    return vectors;
  }
}
