import { describe, it, expect, vi } from 'vitest';
import { retry, sleep } from '../../../src/utils/retry.js';

describe('retry', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(retry(fn)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry failures until one succeeds', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValue('ok');
    const onRetry = vi.fn();

    await expect(retry(fn, { baseDelay: 1, maxDelay: 2, onRetry })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(call => call[0])).toEqual([1, 2]);
  });

  it('should give up after maxRetries with the last error', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('down'));

    await expect(retry(fn, { maxRetries: 2, baseDelay: 1, maxDelay: 2 })).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should not retry errors rejected by shouldRetry', async () => {
    const fn = vi.fn().mockRejectedValue(new RangeError('bad input'));

    await expect(retry(fn, { baseDelay: 1, shouldRetry: err => err instanceof TypeError }))
      .rejects.toThrow('bad input');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should wrap non-error rejections', async () => {
    await expect(retry(() => Promise.reject('plain'), { maxRetries: 0 })).rejects.toThrow('plain');
  });
});

describe('sleep', () => {
  it('should resolve after the delay', async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });

  it('should reject at once for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stopped'));

    await expect(sleep(10_000, controller.signal)).rejects.toThrow('stopped');
  });

  it('should reject when aborted while waiting', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort(new Error('stopped'));

    await expect(pending).rejects.toThrow('stopped');
  });
});
