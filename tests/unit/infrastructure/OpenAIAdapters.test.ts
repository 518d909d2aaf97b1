import { describe, it, expect, vi, beforeEach } from 'vitest';
import OpenAI from 'openai';
import { OpenAIEmbeddingAdapter } from '../../../src/infrastructure/embedding/OpenAIEmbeddingAdapter.js';
import { OpenAICompletionAdapter } from '../../../src/infrastructure/llm/OpenAICompletionAdapter.js';
import { NullCompletionAdapter } from '../../../src/infrastructure/llm/NullCompletionAdapter.js';
import { ExternalServiceError, RateLimitError } from '../../../src/domain/errors/DomainErrors.js';

/**
 * Feature: OpenAI-compatible adapters
 *
 * embedding 與 ask 指令透過 openai SDK 呼叫遠端服務；
 * SDK 以 mock 取代，只驗證請求內容與錯誤轉換。
 */
const { mockEmbeddingsCreate, mockChatCreate } = vi.hoisted(() => ({
  mockEmbeddingsCreate: vi.fn(),
  mockChatCreate: vi.fn(),
}));

vi.mock('openai', () => {
  class APIError extends Error {
    constructor(
      readonly status: number | undefined,
      readonly error: object | undefined,
      message: string | undefined,
      readonly headers: Record<string, string | null | undefined> | undefined,
    ) {
      super(message);
    }
  }
  return {
    default: class MockOpenAI {
      static APIError = APIError;
      embeddings = { create: mockEmbeddingsCreate };
      chat = { completions: { create: mockChatCreate } };
    },
  };
});

describe('OpenAIEmbeddingAdapter', () => {
  let adapter: OpenAIEmbeddingAdapter;

  beforeEach(() => {
    mockEmbeddingsCreate.mockReset();
    adapter = new OpenAIEmbeddingAdapter({ apiKey: 'test-secret', model: 'test-embed', dimension: 3 });
  });

  it('should return vectors in input order', async () => {
    mockEmbeddingsCreate.mockResolvedValue({
      data: [
        { index: 1, embedding: [0, 1, 0] },
        { index: 0, embedding: [1, 0, 0] },
      ],
      usage: { total_tokens: 7 },
    });

    const results = await adapter.embed(['first', 'second']);

    expect(results.map((r) => Array.from(r.vector))).toEqual([[1, 0, 0], [0, 1, 0]]);
    expect(mockEmbeddingsCreate).toHaveBeenCalledWith({
      model: 'test-embed',
      input: ['first', 'second'],
      encoding_format: 'float',
    }, { signal: undefined });
  });

  it('should map 429 to RateLimitError with Retry-After', async () => {
    mockEmbeddingsCreate.mockRejectedValue(new OpenAI.APIError(429, undefined, 'slow down', { 'retry-after': '2' }));

    const err = await adapter.embed(['x']).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RateLimitError);
    expect(err).toHaveProperty('retryAfterMs', 2000);
  });

  it('should keep the HTTP status of other API errors', async () => {
    mockEmbeddingsCreate.mockRejectedValue(new OpenAI.APIError(401, undefined, 'bad key', undefined));

    const err = await adapter.embed(['x']).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExternalServiceError);
    expect(err).toHaveProperty('status', 401);
    expect(err).toHaveProperty('classification', 'degradable');
  });
});

describe('OpenAICompletionAdapter', () => {
  let adapter: OpenAICompletionAdapter;

  beforeEach(() => {
    mockChatCreate.mockReset();
    adapter = new OpenAICompletionAdapter({ baseUrl: 'http://localhost:11434/v1', model: 'test-chat' });
  });

  it('should send the prompt as a single user message', async () => {
    mockChatCreate.mockResolvedValue({ choices: [{ message: { content: '  Graphene is a carbon allotrope.\n' } }] });

    expect(await adapter.generate('What is graphene?')).toBe('Graphene is a carbon allotrope.');
    expect(mockChatCreate).toHaveBeenCalledWith({
      model: 'test-chat',
      messages: [{ role: 'user', content: 'What is graphene?' }],
    });
  });

  it('should reject an empty answer', async () => {
    mockChatCreate.mockResolvedValue({ choices: [] });

    const err = await adapter.generate('anything').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExternalServiceError);
    expect(err).toHaveProperty('status', 502);
  });

  it('should wrap network failures', async () => {
    mockChatCreate.mockRejectedValue(new Error('socket hang up'));

    await expect(adapter.generate('anything')).rejects.toThrow('completion request failed: socket hang up');
  });
});

describe('NullCompletionAdapter', () => {
  it('should refuse to generate', async () => {
    const err = await new NullCompletionAdapter().generate('anything').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExternalServiceError);
    expect(err).toHaveProperty('classification', 'degradable');
  });
});
