/**
 * Scoped deadlines for blocking vendor calls.
 *
 * `withTimeout` installs a deadline around an async operation and hands it an
 * `AbortSignal`. When the deadline passes the signal aborts and the caller gets
 * a `TimeoutError` right away, whether or not the operation honours the signal.
 *
 * Scopes nest: the innermost scope is tracked in `AsyncLocalStorage`, an inner
 * scope aborts when its parent does, and the parent becomes current again when
 * the inner scope exits.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

import { TimeoutError, toError } from '../errors.js';

interface TimeoutScope {
  readonly signal: AbortSignal;
  readonly message: string;
}

const scopeStorage = new AsyncLocalStorage<TimeoutScope>();

export function currentTimeoutSignal(): AbortSignal | null {
  return scopeStorage.getStore()?.signal ?? null;
}

export async function withTimeout<T>(
  seconds: number,
  message: string,
  operation: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const parent = scopeStorage.getStore() ?? null;
  if (parent?.signal.aborted) {
    throw toError(parent.signal.reason ?? new TimeoutError(parent.message));
  }

  const controller = new AbortController();

  let rejectDeadline: (error: Error) => void = () => {};
  const deadline = new Promise<never>((_resolve, reject) => {
    rejectDeadline = reject;
  });

  const abort = (error: Error): void => {
    if (controller.signal.aborted) {
      return;
    }
    controller.abort(error);
    rejectDeadline(error);
  };

  const timer =
    Number.isFinite(seconds) && seconds > 0
      ? setTimeout(() => abort(new TimeoutError(message)), seconds * 1000)
      : null;

  const onParentAbort = (): void => {
    abort(toError(parent?.signal.reason ?? new TimeoutError(parent?.message ?? message)));
  };

  parent?.signal.addEventListener('abort', onParentAbort, { once: true });

  const scope: TimeoutScope = { signal: controller.signal, message };

  try {
    const task = scopeStorage.run(scope, () => operation(controller.signal));
    return await Promise.race([task, deadline]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
    parent?.signal.removeEventListener('abort', onParentAbort);
  }
}
