import { describe, it, expect, vi } from 'vitest';
import { isTransient, statusOf, withRetry } from '../retry.js';
import { TransportError } from '../../errors.js';

function httpError(status: number): Error & { status: number } {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}

describe('statusOf / isTransient', () => {
  it('reads a numeric status', () => {
    expect(statusOf(httpError(429))).toBe(429);
    expect(statusOf(new Error('boom'))).toBeUndefined();
    expect(statusOf('boom')).toBeUndefined();
  });

  it('retries throttling, server errors and status-less network errors', () => {
    expect(isTransient(httpError(429))).toBe(true);
    expect(isTransient(httpError(503))).toBe(true);
    expect(isTransient(new Error('ECONNRESET'))).toBe(true);
  });

  it('does not retry errors the provider rejected on their merits', () => {
    expect(isTransient(httpError(400))).toBe(false);
    expect(isTransient(httpError(401))).toBe(false);
    expect(isTransient(httpError(422))).toBe(false);
  });
});

describe('withRetry', () => {
  it('returns the first success after transient failures', async () => {
    const sleep = vi.fn(async () => {});
    const fn = vi.fn()
      .mockRejectedValueOnce(httpError(503))
      .mockRejectedValueOnce(httpError(429))
      .mockResolvedValueOnce('ok');

    await expect(withRetry('call', fn, { sleep })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [4000]]);
  });

  it('does not retry a semantic error', async () => {
    const sleep = vi.fn(async () => {});
    const fn = vi.fn().mockRejectedValue(httpError(401));

    const attempt = withRetry('Chat completion', fn, { sleep });
    await expect(attempt).rejects.toBeInstanceOf(TransportError);
    await expect(attempt).rejects.toThrow('Chat completion failed after 1 attempt(s). Status: 401');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('gives up after the last delay', async () => {
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValue(httpError(500));

    await expect(withRetry('call', fn, { delays: [5, 10], sleep: async () => {}, onRetry }))
      .rejects.toThrow('call failed after 3 attempt(s). Status: 500');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls).toEqual([[1, 5, 500], [2, 10, 500]]);
  });
});
