import { describe, it, expect, vi } from 'vitest';
import { TimeoutError } from './errors.js';
import { withRetry, withTimeout } from './retry.js';

const fast = { initialDelayMs: 1, maxDelayMs: 2 };

describe('withRetry', () => {
  it('returns the first successful attempt', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce('ok');

    await expect(withRetry(fn, fast)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('gives up after the last attempt with its error', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('down'));

    await expect(withRetry(fn, { ...fast, maxAttempts: 3 })).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('stops early when the error is not retryable', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('404'));

    await expect(withRetry(fn, fast, (error) => error.message !== '404')).rejects.toThrow('404');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('wraps non-error rejections', async () => {
    await expect(withRetry(() => Promise.reject('boom'), { ...fast, maxAttempts: 1 })).rejects.toThrow('boom');
  });
});

describe('withTimeout', () => {
  it('passes through a value that settles in time', async () => {
    await expect(withTimeout(Promise.resolve(7), 50, 'quick')).resolves.toBe(7);
  });

  it('rejects with a TimeoutError when the promise hangs', async () => {
    const pending = withTimeout(new Promise<never>(() => {}), 5, 'Sink write for https://a.example/1');

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(pending).rejects.toThrow('Sink write for https://a.example/1 timed out after 5ms');
  });
});
