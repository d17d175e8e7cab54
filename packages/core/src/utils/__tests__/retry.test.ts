/* eslint-env jest */
import { describe, expect, jest, test } from '@jest/globals';

import { BackendError } from '../../errors.js';
import { retryWithBackoff } from '../retry.js';

const createSleep = () => jest.fn<(ms: number) => Promise<unknown>>().mockResolvedValue(undefined);

describe('retryWithBackoff', () => {
  test('returns the first successful result without sleeping', async () => {
    const sleep = createSleep();
    const warn = jest.fn<(message: string) => void>();

    const result = await retryWithBackoff({
      label: 'Test API',
      attempts: 3,
      backoffMs: 250,
      logger: { warn },
      operation: async () => 'ok',
      sleep,
    });

    expect(result).toBe('ok');
    expect(sleep).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });

  test('logs each failure and backs off before the next attempt', async () => {
    const sleep = createSleep();
    const warn = jest.fn<(message: string) => void>();
    const operation = jest
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('busy'))
      .mockRejectedValueOnce(new Error('busy'))
      .mockResolvedValueOnce('ok');

    const result = await retryWithBackoff({
      label: 'Test API',
      attempts: 3,
      backoffMs: 250,
      logger: { warn },
      operation,
      sleep,
    });

    expect(result).toBe('ok');
    expect(operation.mock.calls).toEqual([[1], [2], [3]]);
    expect(sleep.mock.calls).toEqual([[250], [250]]);
    expect(warn.mock.calls).toEqual([['Test API request failed: busy'], ['Test API request failed: busy']]);
  });

  test('throws a BackendError carrying the last failure once attempts run out', async () => {
    const sleep = createSleep();
    const lastFailure = new Error('third');
    const operation = jest
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockRejectedValueOnce(lastFailure);

    const outcome = retryWithBackoff({ label: 'Test API', attempts: 3, backoffMs: 250, operation, sleep });

    await expect(outcome).rejects.toBeInstanceOf(BackendError);
    await expect(outcome).rejects.toThrow('Test API request failed 3 times!');
    await expect(outcome).rejects.toHaveProperty('cause', lastFailure);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  test('always makes at least one attempt', async () => {
    const operation = jest.fn<(attempt: number) => Promise<string>>().mockRejectedValue('nope');

    await expect(
      retryWithBackoff({ label: 'Test API', attempts: 0, backoffMs: 0, operation }),
    ).rejects.toThrow('Test API request failed 1 times!');
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
