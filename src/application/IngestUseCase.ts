import type { CorpusPort } from '../domain/ports/CorpusPort.js';
import type { Candidate, CorpusItem } from '../domain/entities/CorpusItem.js';
import type { ItemMetadata } from '../domain/entities/ItemMetadata.js';
import type { EmbeddingGateway } from '../infrastructure/embedding/EmbeddingGateway.js';
import type { BatchReport, Outcome } from '../domain/value-objects/Outcome.js';
import { summarize } from '../domain/value-objects/Outcome.js';
import { hashText } from '../domain/value-objects/ContentHash.js';
import { EmptyInputError, LitdbError } from '../domain/errors/DomainErrors.js';
import { Logger } from '../shared/Logger.js';

export type ExistingPolicy = 'skip' | 'refresh';

export interface SubmitOptions {
  /** identifier 已存在時：skip（預設）略過，refresh 以新內容取代 */
  onExisting?: ExistingPolicy;
  signal?: AbortSignal;
}

/** key 排序後序列化，比較 metadata 時不受 key 順序影響 */
function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (val && typeof val === 'object' && !Array.isArray(val)) {
      return Object.fromEntries(Object.entries(val).sort(([a], [b]) => a.localeCompare(b)));
    }
    return val;
  });
}

/**
 * Dedup/Upsert：寫入 corpus 的唯一路徑
 *
 * embedding 在交易外取得，之後單一交易寫入 row + vec + FTS；
 * 只有 LitdbError 會變成 failed，其餘錯誤往上拋
 */
export class IngestUseCase {
  private readonly logger = new Logger('IngestUseCase');

  constructor(
    private readonly corpus: CorpusPort,
    private readonly embedding: EmbeddingGateway,
  ) {}

  async submit(candidate: Candidate, options: SubmitOptions = {}): Promise<Outcome> {
    const { identifier, text } = candidate;
    const metadata = candidate.metadata ?? {};

    if (!identifier.trim() || !text.trim()) {
      const error = new EmptyInputError(identifier);
      this.logger.warn('Rejected empty input', { identifier });
      return { kind: 'failed', identifier, error };
    }

    try {
      const existing = this.corpus.get(identifier);
      if (existing) {
        if ((options.onExisting ?? 'skip') === 'skip') {
          return { kind: 'skipped', identifier, reason: 'duplicate' };
        }
        return await this.refresh(existing, text, metadata, options.signal);
      }

      const vector = await this.embedding.embedOne(text, options.signal);
      const inserted = this.corpus.insert({
        identifier,
        text,
        metadata,
        contentHash: hashText(text),
        embedding: vector,
      });

      if (!inserted) {
        // embedding 期間被其他寫入搶先
        return { kind: 'skipped', identifier, reason: 'duplicate' };
      }
      this.logger.debug('Inserted item', { identifier });
      return { kind: 'inserted', identifier };
    } catch (err) {
      if (err instanceof LitdbError) {
        this.logger.warn('Submit failed', { identifier, error: err });
        return { kind: 'failed', identifier, error: err };
      }
      throw err;
    }
  }

  async submitMany(candidates: Iterable<Candidate>, options: SubmitOptions = {}): Promise<BatchReport> {
    const outcomes: Outcome[] = [];
    for (const candidate of candidates) {
      options.signal?.throwIfAborted();
      outcomes.push(await this.submit(candidate, options));
    }
    return summarize(outcomes);
  }

  /** text 未變只改 metadata；text 改變才重新 embedding */
  private async refresh(
    existing: CorpusItem,
    text: string,
    metadata: ItemMetadata,
    signal?: AbortSignal,
  ): Promise<Outcome> {
    const identifier = existing.identifier;
    const contentHash = hashText(text);

    if (contentHash === existing.contentHash) {
      if (canonicalJson(metadata) === canonicalJson(existing.metadata)) {
        return { kind: 'skipped', identifier, reason: 'unchanged' };
      }
      this.corpus.replace(identifier, { text, metadata, contentHash });
      return { kind: 'updated', identifier, reembedded: false };
    }

    const vector = await this.embedding.embedOne(text, signal);
    this.corpus.replace(identifier, { text, metadata, contentHash, embedding: vector });
    this.logger.debug('Refreshed item', { identifier });
    return { kind: 'updated', identifier, reembedded: true };
  }
}
