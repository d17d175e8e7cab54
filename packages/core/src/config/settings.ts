/**
 * Environment-driven settings for the backends.
 *
 * Responsibilities:
 * - Resolve the per-vendor context budget (`OPENAI_TOKEN_LIMIT`, `ANTHROPIC_TOKEN_LIMIT`).
 * - Resolve the request deadlines and the retry policy.
 *
 * Values are read when a backend is constructed, never at module load, so tests and
 * long-lived sessions can change the environment between constructions.
 */

import { ConfigurationError } from '../errors.js';

export const DEFAULT_TOKEN_LIMIT = 8000;
export const DEFAULT_RETRY_ATTEMPTS = 3;
export const DEFAULT_RETRY_BACKOFF_MS = 10_000;
export const DEFAULT_RETRY_TIMEOUT_SEC = 60;

export type Vendor = 'openai' | 'anthropic';

const TOKEN_LIMIT_ENV: Record<Vendor, string> = {
  openai: 'OPENAI_TOKEN_LIMIT',
  anthropic: 'ANTHROPIC_TOKEN_LIMIT',
};

const SINGLE_SHOT_TIMEOUT_SEC: Record<Vendor, number> = {
  openai: 120,
  anthropic: 60,
};

export interface RetrySettings {
  attempts: number;
  backoffMs: number;
  timeoutSec: number;
}

type Env = Record<string, string | undefined>;

export function parsePositiveInteger(name: string, rawValue: string): number {
  const trimmed = rawValue.trim();
  const parsed = Number.parseInt(trimmed, 10);
  if (!/^\d+$/.test(trimmed) || !Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer when provided.`);
  }

  return parsed;
}

export function parseNonNegativeInteger(name: string, rawValue: string): number {
  const trimmed = rawValue.trim();
  const parsed = Number.parseInt(trimmed, 10);
  if (!/^\d+$/.test(trimmed) || !Number.isFinite(parsed)) {
    throw new ConfigurationError(`${name} must be a non-negative integer when provided.`);
  }

  return parsed;
}

/**
 * Unset falls back to {@link DEFAULT_TOKEN_LIMIT}; an empty value disables truncation.
 */
export function resolveTokenLimit(vendor: Vendor, env: Env = process.env): number | null {
  const name = TOKEN_LIMIT_ENV[vendor];
  const rawValue = env[name];

  if (typeof rawValue === 'undefined') {
    return DEFAULT_TOKEN_LIMIT;
  }

  if (rawValue.trim() === '') {
    return null;
  }

  return parsePositiveInteger(name, rawValue);
}

export function resolveRequestTimeoutSec(vendor: Vendor, env: Env = process.env): number {
  const rawValue = env.BESSIE_REQUEST_TIMEOUT_SEC;
  if (typeof rawValue === 'undefined' || rawValue.trim() === '') {
    return SINGLE_SHOT_TIMEOUT_SEC[vendor];
  }

  return parsePositiveInteger('BESSIE_REQUEST_TIMEOUT_SEC', rawValue);
}

export function resolveRetrySettings(env: Env = process.env): RetrySettings {
  const attempts = env.BESSIE_RETRY_ATTEMPTS?.trim()
    ? parsePositiveInteger('BESSIE_RETRY_ATTEMPTS', env.BESSIE_RETRY_ATTEMPTS)
    : DEFAULT_RETRY_ATTEMPTS;
  const backoffMs = env.BESSIE_RETRY_BACKOFF_MS?.trim()
    ? parseNonNegativeInteger('BESSIE_RETRY_BACKOFF_MS', env.BESSIE_RETRY_BACKOFF_MS)
    : DEFAULT_RETRY_BACKOFF_MS;
  const timeoutSec = env.BESSIE_RETRY_TIMEOUT_SEC?.trim()
    ? parsePositiveInteger('BESSIE_RETRY_TIMEOUT_SEC', env.BESSIE_RETRY_TIMEOUT_SEC)
    : DEFAULT_RETRY_TIMEOUT_SEC;

  return { attempts, backoffMs, timeoutSec };
}

export function isTruthyFlag(rawValue: string | undefined): boolean {
  if (typeof rawValue !== 'string') {
    return false;
  }

  return ['1', 'true', 'yes', 'on'].includes(rawValue.trim().toLowerCase());
}
