/**
 * Tests for retry with exponential backoff.
 */

import { describe, it, expect, vi } from 'vitest';
import { calculateBackoff, withRetry } from '../../src/utils/retry.js';
import { PermanentError, TransientError, isTransientError } from '../../src/utils/errors.js';

describe('calculateBackoff', () => {
  it('doubles from the initial delay', () => {
    expect(calculateBackoff(0, 1000, 10_000, 2)).toBe(1000);
    expect(calculateBackoff(1, 1000, 10_000, 2)).toBe(2000);
    expect(calculateBackoff(3, 1000, 10_000, 2)).toBe(8000);
  });

  it('caps at the maximum delay', () => {
    expect(calculateBackoff(4, 1000, 10_000, 2)).toBe(10_000);
  });
});

describe('withRetry', () => {
  it('returns the first success without retrying', async () => {
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(withRetry('op', fn, { initialDelayMs: 1 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries until the operation succeeds', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransientError('flaky', 'TIMEOUT'))
      .mockRejectedValueOnce(new TransientError('flaky', 'TIMEOUT'))
      .mockResolvedValue('ok');

    await expect(withRetry('op', fn, { maxRetries: 3, initialDelayMs: 1 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('makes maxRetries + 1 attempts, then throws the last error', async () => {
    const errors = [new TransientError('first', 'TIMEOUT'), new TransientError('second', 'TIMEOUT'), new TransientError('third', 'TIMEOUT')];
    let call = 0;
    const fn = vi.fn(async () => {
      throw errors[call++];
    });

    await expect(withRetry('op', fn, { maxRetries: 2, initialDelayMs: 1 })).rejects.toBe(errors[2]);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry errors rejected by retryOn', async () => {
    const permanent = new PermanentError('bad input', 'PROVIDER_REJECTED');
    const fn = vi.fn().mockRejectedValue(permanent);

    await expect(
      withRetry('op', fn, { maxRetries: 3, initialDelayMs: 1, retryOn: isTransientError }),
    ).rejects.toBe(permanent);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('reports each retry with its backoff delay', async () => {
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValue(new TransientError('down', 'TRANSPORT_FAILED'));

    await expect(
      withRetry('op', fn, { maxRetries: 2, initialDelayMs: 1, backoffFactor: 2, onRetry }),
    ).rejects.toThrow('down');

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0]?.slice(1)).toEqual([1, 1]);
    expect(onRetry.mock.calls[1]?.slice(1)).toEqual([2, 2]);
  });

  it('wraps non-Error throws', async () => {
    const fn = vi.fn().mockRejectedValue('plain string');

    await expect(withRetry('op', fn, { maxRetries: 0 })).rejects.toThrow('plain string');
  });
});
