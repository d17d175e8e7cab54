/* eslint-env jest */
import { describe, expect, test } from '@jest/globals';

import { ConfigurationError } from '../../errors.js';
import {
  DEFAULT_TOKEN_LIMIT,
  isTruthyFlag,
  resolveRequestTimeoutSec,
  resolveRetrySettings,
  resolveTokenLimit,
} from '../settings.js';

describe('resolveTokenLimit', () => {
  test('falls back to the default budget when the variable is unset', () => {
    expect(resolveTokenLimit('openai', {})).toBe(DEFAULT_TOKEN_LIMIT);
    expect(DEFAULT_TOKEN_LIMIT).toBe(8000);
  });

  test('disables truncation for an empty value', () => {
    expect(resolveTokenLimit('openai', { OPENAI_TOKEN_LIMIT: '' })).toBeNull();
    expect(resolveTokenLimit('anthropic', { ANTHROPIC_TOKEN_LIMIT: '  ' })).toBeNull();
  });

  test('reads each vendor from its own variable', () => {
    const env = { OPENAI_TOKEN_LIMIT: '4096', ANTHROPIC_TOKEN_LIMIT: '100000' };

    expect(resolveTokenLimit('openai', env)).toBe(4096);
    expect(resolveTokenLimit('anthropic', env)).toBe(100000);
  });

  test('rejects values that are not positive integers', () => {
    expect(() => resolveTokenLimit('openai', { OPENAI_TOKEN_LIMIT: 'lots' })).toThrow(
      ConfigurationError,
    );
    expect(() => resolveTokenLimit('anthropic', { ANTHROPIC_TOKEN_LIMIT: '0' })).toThrow(
      'ANTHROPIC_TOKEN_LIMIT must be a positive integer when provided.',
    );
  });
});

describe('resolveRequestTimeoutSec', () => {
  test('uses the per-vendor single attempt deadline', () => {
    expect(resolveRequestTimeoutSec('openai', {})).toBe(120);
    expect(resolveRequestTimeoutSec('anthropic', {})).toBe(60);
  });

  test('honours BESSIE_REQUEST_TIMEOUT_SEC for every vendor', () => {
    const env = { BESSIE_REQUEST_TIMEOUT_SEC: '30' };

    expect(resolveRequestTimeoutSec('openai', env)).toBe(30);
    expect(resolveRequestTimeoutSec('anthropic', env)).toBe(30);
  });
});

describe('resolveRetrySettings', () => {
  test('defaults to three attempts, ten second backoff and sixty second attempts', () => {
    expect(resolveRetrySettings({})).toEqual({ attempts: 3, backoffMs: 10000, timeoutSec: 60 });
  });

  test('reads overrides from the environment', () => {
    expect(
      resolveRetrySettings({
        BESSIE_RETRY_ATTEMPTS: '5',
        BESSIE_RETRY_BACKOFF_MS: '0',
        BESSIE_RETRY_TIMEOUT_SEC: '15',
      }),
    ).toEqual({ attempts: 5, backoffMs: 0, timeoutSec: 15 });
  });

  test('rejects a zero attempt count', () => {
    expect(() => resolveRetrySettings({ BESSIE_RETRY_ATTEMPTS: '0' })).toThrow(
      'BESSIE_RETRY_ATTEMPTS must be a positive integer when provided.',
    );
  });

  test('rejects a negative backoff', () => {
    expect(() => resolveRetrySettings({ BESSIE_RETRY_BACKOFF_MS: '-1' })).toThrow(
      'BESSIE_RETRY_BACKOFF_MS must be a non-negative integer when provided.',
    );
  });
});

describe('isTruthyFlag', () => {
  test('accepts the usual spellings of yes', () => {
    expect(['1', 'true', ' YES ', 'on'].map(isTruthyFlag)).toEqual([true, true, true, true]);
  });

  test('treats anything else as off', () => {
    expect([undefined, '', '0', 'false', 'maybe'].map(isTruthyFlag)).toEqual([
      false,
      false,
      false,
      false,
      false,
    ]);
  });
});
