/* eslint-env jest */
import { describe, expect, test } from '@jest/globals';

import { createTiktokenCounter, encodingNameForModel } from '../tokenCounting.js';

describe('encodingNameForModel', () => {
  test('uses o200k_base for the newer model families', () => {
    expect(encodingNameForModel('gpt-4o-mini')).toBe('o200k_base');
    expect(encodingNameForModel('o3')).toBe('o200k_base');
  });

  test('falls back to cl100k_base', () => {
    expect(encodingNameForModel('gpt-4')).toBe('cl100k_base');
    expect(encodingNameForModel('gpt-3.5-turbo')).toBe('cl100k_base');
  });
});

describe('createTiktokenCounter', () => {
  test('counts tokens with the model encoding', () => {
    const count = createTiktokenCounter('gpt-4');

    expect(count('')).toBe(0);
    expect(count('hello world')).toBe(2);
  });

  test('treats special-token text as ordinary text', () => {
    expect(() => createTiktokenCounter('gpt-4')('<|endoftext|>')).not.toThrow();
  });
});
