/**
 * Minimal logging contract used across the core.
 *
 * Every method is optional so callers can pass partial sinks (tests usually
 * only capture `warn`). The console logger hides `info` unless debug output is
 * enabled, which keeps request/response dumps out of normal CLI sessions.
 */

import { getDebugFlag } from '../lib/startupFlags.js';

export interface Logger {
  info?(message: string): void;
  warn?(message: string): void;
  error?(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Defaults to the `debug` startup flag at call time. */
  debug?: boolean | (() => boolean);
  sink?: Pick<Console, 'log' | 'warn' | 'error'>;
}

export function createConsoleLogger({
  debug = getDebugFlag,
  sink = console,
}: ConsoleLoggerOptions = {}): Required<Logger> {
  const isDebug = typeof debug === 'function' ? debug : () => debug;

  return {
    info(message) {
      if (isDebug()) {
        sink.log(message);
      }
    },
    warn(message) {
      sink.warn(message);
    },
    error(message) {
      sink.error(message);
    },
  };
}

export function formatDebugPayload(payload: unknown): string {
  if (typeof payload === 'string') {
    return payload;
  }
  try {
    return JSON.stringify(payload, null, 2);
  } catch (_error) {
    return String(payload);
  }
}
