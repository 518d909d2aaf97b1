import { describe, it, expect, vi, afterEach } from 'vitest';
import { withRetry, isRetryableError } from '../../../src/shared/RetryPolicy.js';
import { ExternalServiceError, RateLimitError, NotFoundError } from '../../../src/domain/errors/DomainErrors.js';

const isBusy = (err: unknown) => err instanceof Error && err.message === 'busy';

describe('RetryPolicy', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should succeed on first try', async () => {
    const fn = vi.fn().mockReturnValue('ok');
    const result = await withRetry(fn, {
      maxRetries: 3,
      baseDelayMs: 10,
      isRetryable: () => true,
    });
    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry on retryable error and succeed', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('busy'))
      .mockReturnValue('ok');

    const result = await withRetry(fn, {
      maxRetries: 3,
      baseDelayMs: 1, // 測試用最小延遲
      isRetryable: isBusy,
    });
    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should throw after max retries exhausted', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('busy'));

    await expect(
      withRetry(fn, {
        maxRetries: 2,
        baseDelayMs: 1,
        isRetryable: () => true,
      })
    ).rejects.toThrow('busy');
    expect(fn).toHaveBeenCalledTimes(3); // initial + 2 retries
  });

  it('should not retry non-retryable errors', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('fatal'));

    await expect(
      withRetry(fn, {
        maxRetries: 3,
        baseDelayMs: 1,
        isRetryable: isBusy,
      })
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should call onRetry callback', async () => {
    const onRetry = vi.fn();
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('busy'))
      .mockReturnValue('ok');

    await withRetry(fn, {
      maxRetries: 3,
      baseDelayMs: 1,
      isRetryable: () => true,
      onRetry,
    });
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(1, expect.any(Error));
  });

  it('should wait at least Retry-After before retrying a rate limit', async () => {
    vi.useFakeTimers();
    const fn = vi.fn()
      .mockRejectedValueOnce(new RateLimitError('openalex', 20))
      .mockResolvedValue('ok');

    const pending = withRetry(fn, { maxRetries: 1, baseDelayMs: 1, isRetryable: isRetryableError });

    await vi.advanceTimersByTimeAsync(10);
    expect(fn).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(20);
    expect(fn).toHaveBeenCalledTimes(2);
    await expect(pending).resolves.toBe('ok');
  });

  it('should stop retrying once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn().mockRejectedValue(new Error('busy'));

    await expect(
      withRetry(fn, { maxRetries: 3, baseDelayMs: 1, isRetryable: () => true, signal: controller.signal })
    ).rejects.toThrow('busy');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should treat only retryable domain errors as retryable by default', () => {
    expect(isRetryableError(new ExternalServiceError('web', 'x', 502))).toBe(true);
    expect(isRetryableError(new RateLimitError('web'))).toBe(true);
    expect(isRetryableError(new ExternalServiceError('web', 'x', 404))).toBe(false);
    expect(isRetryableError(new NotFoundError('item', 'a'))).toBe(false);
    expect(isRetryableError(new Error('busy'))).toBe(false);
  });
});
