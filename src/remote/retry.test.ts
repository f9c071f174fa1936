import { describe, expect, it, vi } from 'vitest';
import { parseRetryAfterSeconds } from './retry-after.js';
import {
  backoffSeconds,
  failed,
  RemoteCallError,
  RemoteResult,
  retryDelaySeconds,
  succeeded,
  withRetry,
} from './retry.js';

function scripted<T>(...results: Array<RemoteResult<T> | Error>) {
  let index = 0;
  return vi.fn(async (): Promise<RemoteResult<T>> => {
    const next = results[Math.min(index, results.length - 1)];
    index += 1;
    if (next instanceof Error) throw next;
    return next;
  });
}

const transient = (message = 'upstream unavailable') => failed({ kind: 'transient', status: 503, message });

describe('parseRetryAfterSeconds', () => {
  it('reads delta seconds, rounding up fractions', () => {
    expect(parseRetryAfterSeconds('3')).toBe(3);
    expect(parseRetryAfterSeconds(' 2.5 ')).toBe(3);
    expect(parseRetryAfterSeconds('0')).toBe(0);
  });

  it('reads an HTTP date relative to now', () => {
    const now = new Date('2024-05-01T12:00:00Z');

    expect(parseRetryAfterSeconds('Wed, 01 May 2024 12:00:10 GMT', 5, now)).toBe(10);
    expect(parseRetryAfterSeconds('Wed, 01 May 2024 11:59:00 GMT', 5, now)).toBe(0);
  });

  it('falls back when the header is absent or unreadable', () => {
    expect(parseRetryAfterSeconds(null)).toBe(5);
    expect(parseRetryAfterSeconds('')).toBe(5);
    expect(parseRetryAfterSeconds('soon', 7)).toBe(7);
  });
});

describe('retry schedule', () => {
  it('backs off exponentially from a zero-based attempt', () => {
    expect([0, 1, 2, 3].map(backoffSeconds)).toEqual([2, 3, 5, 9]);
  });

  it('waits one second past Retry-After on a rate limit', () => {
    expect(retryDelaySeconds({ kind: 'rate-limited', status: 429, message: 'slow down', retryAfterSeconds: 3 }, 4)).toBe(4);
    expect(retryDelaySeconds({ kind: 'transient', message: 'reset' }, 2)).toBe(5);
    expect(retryDelaySeconds({ kind: 'terminal', status: 404, message: 'gone' }, 0)).toBeUndefined();
  });
});

describe('withRetry', () => {
  it('returns the first success without sleeping', async () => {
    const call = scripted(succeeded('page'));
    const sleep = vi.fn(async () => {});

    await expect(withRetry(call, { sleep })).resolves.toBe('page');
    expect(call).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('honours Retry-After on the second attempt and retries the same call', async () => {
    const call = scripted<string>(
      transient(),
      failed({ kind: 'rate-limited', status: 429, message: 'rate limited', retryAfterSeconds: 3 }),
      succeeded('written')
    );
    const sleep = vi.fn(async () => {});

    await expect(withRetry(call, { sleep })).resolves.toBe('written');
    expect(call).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[2000], [4000]]);
  });

  it('treats a thrown error as transient', async () => {
    const call = scripted<number>(new Error('socket hang up'), succeeded(42));
    const sleep = vi.fn(async () => {});

    await expect(withRetry(call, { sleep })).resolves.toBe(42);
    expect(sleep.mock.calls).toEqual([[2000]]);
  });

  it('does not retry a terminal failure', async () => {
    const call = scripted<string>(failed({ kind: 'terminal', status: 404, message: 'not found' }));
    const sleep = vi.fn(async () => {});

    const error = await withRetry(call, { sleep, label: 'fetch:abc offset 0' }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RemoteCallError);
    expect(error).toMatchObject({
      code: 'REMOTE_REJECTED',
      statusCode: 404,
      attempts: 1,
      message: 'fetch:abc offset 0 rejected: not found',
    });
    expect(call).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('gives up after maxAttempts without sleeping after the last one', async () => {
    const call = scripted<string>(transient('boom'));
    const sleep = vi.fn(async () => {});

    const error = await withRetry(call, { sleep, maxAttempts: 3, label: 'page' }).catch((caught: unknown) => caught);

    expect(error).toMatchObject({
      code: 'RETRY_EXHAUSTED',
      statusCode: 503,
      attempts: 3,
      message: 'page failed after 3 attempts: boom',
    });
    expect(call).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[2000], [3000]]);
  });

  it('counts rate-limited attempts toward the ceiling', async () => {
    const call = scripted<string>(failed({ kind: 'rate-limited', status: 429, message: 'slow down', retryAfterSeconds: 0 }));
    const sleep = vi.fn(async () => {});

    const error = await withRetry(call, { sleep, maxAttempts: 2 }).catch((caught: unknown) => caught);

    expect(error).toMatchObject({ code: 'RETRY_EXHAUSTED', statusCode: 429, attempts: 2 });
    expect(error).toMatchObject({ details: { kind: 'rate-limited', attempts: 2 } });
    expect(sleep.mock.calls).toEqual([[1000]]);
  });
});
