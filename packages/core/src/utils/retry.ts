import { setTimeout as delay } from 'node:timers/promises';

import { BackendError, describeError } from '../errors.js';
import type { Logger } from './logger.js';

export interface RetryOptions<T> {
  /** Vendor label used in log lines and the final error, e.g. `OpenAI API`. */
  label: string;
  attempts: number;
  backoffMs: number;
  logger?: Logger | null;
  operation: (attempt: number) => Promise<T>;
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Runs `operation` until it resolves or `attempts` runs out. Individual failures
 * are logged and followed by a fixed backoff; only exhaustion reaches the caller.
 */
export async function retryWithBackoff<T>({
  label,
  attempts,
  backoffMs,
  logger = null,
  operation,
  sleep = (ms) => delay(ms),
}: RetryOptions<T>): Promise<T> {
  const totalAttempts = Math.max(1, Math.floor(attempts));
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= totalAttempts; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      logger?.warn?.(`${label} request failed: ${describeError(error)}`);
      if (attempt < totalAttempts && backoffMs > 0) {
        await sleep(backoffMs);
      }
    }
  }

  throw new BackendError(`${label} request failed ${totalAttempts} times!`, { cause: lastError });
}
