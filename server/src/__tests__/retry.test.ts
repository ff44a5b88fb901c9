import { describe, it, expect, vi } from 'vitest';
import { getStatusCode, isTransient, withRetry } from '../lib/retry.js';

function httpError(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

describe('withRetry', () => {
  it('retries transient HTTP statuses until the call succeeds', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts < 3) throw httpError('temporary outage', 503);
      return 'ok';
    }, { maxAttempts: 3, baseDelay: 1 });

    expect(result).toBe('ok');
    expect(attempts).toBe(3);
  });

  it('retries transient network error codes', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts < 2) throw Object.assign(new Error('socket closed'), { code: 'ECONNRESET' });
      return 42;
    }, { maxAttempts: 2, baseDelay: 1 });

    expect(result).toBe(42);
    expect(attempts).toBe(2);
  });

  it('honours Retry-After from response metadata', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts === 1) {
        throw Object.assign(new Error('rate limited'), {
          response: { status: 429, headers: new Headers([['retry-after', '0.001']]) },
        });
      }
      return 'done';
    }, { maxAttempts: 2, baseDelay: 1 });

    expect(result).toBe('done');
    expect(attempts).toBe(2);
  });

  it('does not retry non-transient errors', async () => {
    let attempts = 0;
    await expect(withRetry(async () => {
      attempts += 1;
      throw new Error('validation failed');
    }, { maxAttempts: 3, baseDelay: 1 })).rejects.toThrow('validation failed');
    expect(attempts).toBe(1);
  });

  it('gives up after maxAttempts and rethrows the last error', async () => {
    const onRetry = vi.fn();
    let attempts = 0;
    await expect(withRetry(async () => {
      attempts += 1;
      throw httpError(`overloaded #${attempts}`, 529);
    }, { maxAttempts: 3, baseDelay: 1, onRetry })).rejects.toThrow('overloaded #3');

    expect(attempts).toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(1, 1, expect.any(Error));
  });

  it('never retries an AbortError', async () => {
    const onRetry = vi.fn();
    const abortError = new DOMException('The operation was aborted', 'AbortError');

    await expect(withRetry(async () => {
      throw abortError;
    }, { maxAttempts: 3, baseDelay: 1, onRetry })).rejects.toThrow('The operation was aborted');
    expect(onRetry).not.toHaveBeenCalled();
  });

  it('stops retrying once the signal aborts', async () => {
    const controller = new AbortController();
    let attempts = 0;

    await expect(withRetry(async () => {
      attempts += 1;
      controller.abort();
      throw httpError('temporary outage', 503);
    }, { maxAttempts: 5, baseDelay: 1, signal: controller.signal })).rejects.toThrow('temporary outage');
    expect(attempts).toBe(1);
  });

  it('cuts the backoff wait short on abort', async () => {
    const controller = new AbortController();
    let attempts = 0;
    const started = Date.now();

    const pending = withRetry(async () => {
      attempts += 1;
      throw httpError('temporary outage', 503);
    }, { maxAttempts: 3, baseDelay: 10_000, signal: controller.signal });
    setTimeout(() => controller.abort(), 10);

    await expect(pending).rejects.toThrow('temporary outage');
    expect(attempts).toBe(1);
    expect(Date.now() - started).toBeLessThan(5_000);
  });
});

describe('isTransient', () => {
  it('lets a known status decide on its own', () => {
    expect(isTransient(httpError('rate limit reached', 400))).toBe(false);
    expect(isTransient(httpError('anything', 502))).toBe(true);
  });

  it('recognises transient wording and embedded status codes', () => {
    expect(isTransient(new Error('fetch failed'))).toBe(true);
    expect(isTransient(new Error('API error 503: try later'))).toBe(true);
    expect(isTransient(new Error('bad request body'))).toBe(false);
  });
});

describe('getStatusCode', () => {
  it('reads status, statusCode or response.status', () => {
    expect(getStatusCode({ status: 429 })).toBe(429);
    expect(getStatusCode({ statusCode: 500 })).toBe(500);
    expect(getStatusCode({ response: { status: 503 } })).toBe(503);
    expect(getStatusCode(new Error('plain'))).toBeNull();
    expect(getStatusCode('not an object')).toBeNull();
  });
});
