export type ErrorClassification = 'retryable' | 'degradable' | 'manual';

/** 所有 litdb domain 錯誤的基底類別 */
export abstract class LitdbError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/** 取出錯誤訊息，非 Error 的 throw 值轉成字串 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// --- Manual ---

/** 抽取結果或送入的文字為空白，不寫入任何資料 */
export class EmptyInputError extends LitdbError {
  readonly classification = 'manual' as const;
  readonly code = 'EMPTY_INPUT';

  constructor(
    public readonly identifier: string,
    options?: ErrorOptions,
  ) {
    super(`No usable text for "${identifier}"`, options);
  }
}

export type NotFoundKind = 'item' | 'filter' | 'directory' | 'file' | 'work' | 'author';

export class NotFoundError extends LitdbError {
  readonly classification = 'manual' as const;
  readonly code = 'NOT_FOUND';

  constructor(
    public readonly kind: NotFoundKind,
    public readonly key: string,
    options?: ErrorOptions,
  ) {
    super(`${kind} "${key}" not found`, options);
  }
}

/** 使用者輸入的 FTS5 查詢語法無法解析 */
export class InvalidQueryError extends LitdbError {
  readonly classification = 'manual' as const;
  readonly code = 'INVALID_QUERY';

  constructor(
    public readonly query: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid full-text query "${query}": ${reason}`, options);
  }
}

/** 指令需要的設定值沒有填 */
export class MissingConfigError extends LitdbError {
  readonly classification = 'manual' as const;
  readonly code = 'MISSING_CONFIG';

  constructor(public readonly key: string) {
    super(`Set ${key} in litdb.json or the environment`);
  }
}

export class EmbeddingDimensionMismatchError extends LitdbError {
  readonly classification = 'manual' as const;
  readonly code = 'DIMENSION_MISMATCH';

  constructor(
    public readonly storedDimension: number,
    public readonly configuredDimension: number,
  ) {
    super(
      `Embedding dimension mismatch: database has ${storedDimension}, config specifies ${configuredDimension}. ` +
      'Point database.path at a new file or switch back to the original embedding model.',
    );
  }
}

// --- Degradable / Retryable ---

export type ExternalService = 'embedding' | 'completion' | 'openalex' | 'unpaywall' | 'web';

/**
 * 外部服務（embedding、completion、OpenAlex、Unpaywall、網頁）呼叫失敗
 * 網路錯誤與 5xx 視為 retryable，其餘 HTTP 錯誤為 degradable
 */
export class ExternalServiceError extends LitdbError {
  readonly classification: ErrorClassification;
  readonly code: string = 'EXTERNAL_SERVICE';

  constructor(
    public readonly service: ExternalService,
    message: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.classification = status === undefined || status >= 500 ? 'retryable' : 'degradable';
  }
}

export class RateLimitError extends ExternalServiceError {
  readonly classification = 'retryable' as const;
  readonly code = 'RATE_LIMITED';

  constructor(
    service: ExternalService,
    public readonly retryAfterMs?: number,
    options?: ErrorOptions,
  ) {
    super(service, `Rate limited by ${service}`, 429, options);
  }
}

/** 特定格式的抽取失敗，只影響單一檔案 */
export class ExtractionError extends LitdbError {
  readonly classification = 'degradable' as const;
  readonly code = 'EXTRACTION_FAILED';

  constructor(
    public readonly path: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Could not extract text from "${path}": ${reason}`, options);
  }
}
