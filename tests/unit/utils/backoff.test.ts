/**
 * Unit tests for dispatch retry
 *
 * @module tests/unit/utils/backoff
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  DISPATCH_RETRY_POLICY,
  isRetryableDispatchError,
  retryDelayMs,
  withRetry,
} from '../../../src/utils/backoff.js';
import { BatchDispatchError } from '../../../src/services/extraction/errors.js';

const NO_WAIT = { ...DISPATCH_RETRY_POLICY, baseDelayMs: 0, maxDelayMs: 0, jitterFraction: 0 };

describe('retryDelayMs', () => {
  it('doubles per retry up to the cap', () => {
    const policy = { ...DISPATCH_RETRY_POLICY, jitterFraction: 0 };
    expect(retryDelayMs(0, policy)).toBe(1000);
    expect(retryDelayMs(1, policy)).toBe(2000);
    expect(retryDelayMs(10, policy)).toBe(30_000);
  });
});

describe('isRetryableDispatchError', () => {
  it('retries busy or unreachable servers only', () => {
    expect(isRetryableDispatchError(new BatchDispatchError('t', 'MODEL_TIMEOUT'))).toBe(true);
    expect(isRetryableDispatchError(new BatchDispatchError('n', 'MODEL_NETWORK_ERROR'))).toBe(true);
    expect(
      isRetryableDispatchError(new BatchDispatchError('h', 'MODEL_HTTP_ERROR', { status: 502 }))
    ).toBe(true);
    expect(
      isRetryableDispatchError(new BatchDispatchError('h', 'MODEL_HTTP_ERROR', { status: 400 }))
    ).toBe(false);
    expect(isRetryableDispatchError(new Error('HTTP 503'))).toBe(false);
  });
});

describe('withRetry', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs what is retried and returns the first success', async () => {
    const log = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const fn = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(new BatchDispatchError('refused', 'MODEL_NETWORK_ERROR'))
      .mockResolvedValueOnce('done');

    await expect(withRetry(fn, { policy: NO_WAIT, label: 'call-1 batch 2' })).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(log).toHaveBeenCalledWith(
      '[Backoff] call-1 batch 2: attempt 1/3 failed (refused), retrying in 0ms'
    );
  });

  it('stops after the last attempt and rethrows', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const error = new BatchDispatchError('timed out', 'MODEL_TIMEOUT');
    const fn = vi.fn(async () => {
      throw error;
    });

    await expect(withRetry(fn, { policy: NO_WAIT, label: 'x' })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('rethrows a permanent error at once', async () => {
    const fn = vi.fn(async () => {
      throw new BatchDispatchError('not found', 'MODEL_HTTP_ERROR', { status: 404 });
    });
    await expect(withRetry(fn, { policy: NO_WAIT, label: 'x' })).rejects.toMatchObject({
      message: 'not found',
    });
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
