import { afterEach, describe, expect, it, vi } from 'vitest';
import { executeWithRetry } from '../retry';

afterEach(() => {
  vi.useRealTimers();
});

describe('executeWithRetry', () => {
  it('returns the result when the operation succeeds first try', async () => {
    const op = vi.fn().mockResolvedValue('ok');
    const result = await executeWithRetry(op);
    expect(result).toBe('ok');
    expect(op).toHaveBeenCalledTimes(1);
  });

  it('backs off and retries until the operation recovers', async () => {
    const op = vi
      .fn()
      .mockRejectedValueOnce(new Error('temporary'))
      .mockRejectedValueOnce(new Error('temporary'))
      .mockResolvedValueOnce('recovered');
    const onRetry = vi.fn();

    vi.useFakeTimers();
    const promise = executeWithRetry(op, { initialDelayMs: 10, onRetry });
    await vi.runAllTimersAsync();

    await expect(promise).resolves.toBe('recovered');
    expect(op).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([attempt, , delay]) => [attempt, delay])).toEqual([
      [1, 10],
      [2, 20],
    ]);
  });

  it('throws the final error when all retries fail', async () => {
    const op = vi.fn().mockRejectedValue(new Error('boom'));
    await expect(executeWithRetry(op, { maxAttempts: 3, initialDelayMs: 0, backoffFactor: 1 })).rejects.toThrow(
      'boom',
    );
    expect(op).toHaveBeenCalledTimes(3);
  });

  it('does not retry errors the predicate rejects', async () => {
    const op = vi.fn().mockRejectedValue(new Error('bad request'));
    await expect(executeWithRetry(op, { initialDelayMs: 0, shouldRetry: () => false })).rejects.toThrow(
      'bad request',
    );
    expect(op).toHaveBeenCalledTimes(1);
  });
});
