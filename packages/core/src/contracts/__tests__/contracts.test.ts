/* eslint-env jest */
import { describe, expect, test } from '@jest/globals';

import { InvalidRoleError } from '../../errors.js';
import { agentMessage, createMessage, createRequest, isSender } from '../index.js';

describe('createMessage', () => {
  test('builds a frozen message for a known sender', () => {
    const message = createMessage('environment', 'ls -la');

    expect(message).toEqual({ sender: 'environment', content: 'ls -la' });
    expect(Object.isFrozen(message)).toBe(true);
  });

  test('rejects unknown senders', () => {
    expect(() => createMessage('user', 'hi')).toThrow(InvalidRoleError);
    expect(() => createMessage('user', 'hi')).toThrow('Unknown message sender "user".');
  });

  test('rejects an empty sender', () => {
    expect(() => createMessage('', 'hi')).toThrow('Message sender must not be empty.');
  });

  test('offers shorthands per sender', () => {
    expect(agentMessage('done')).toEqual({ sender: 'agent', content: 'done' });
  });
});

describe('isSender', () => {
  test('recognises only the three logical senders', () => {
    expect(['system', 'environment', 'agent', 'assistant', 42].map(isSender)).toEqual([
      true,
      true,
      true,
      false,
      false,
    ]);
  });
});

describe('createRequest', () => {
  test('copies the stop sequences', () => {
    const stop = ['\n'];
    const request = createRequest('prompt', { stop });
    stop.push('END');

    expect(request.stop).toEqual(['\n']);
    expect(Object.isFrozen(request)).toBe(true);
  });

  test('omits stop sequences when none are given', () => {
    expect('stop' in createRequest('prompt')).toBe(false);
    expect('stop' in createRequest('prompt', { stop: null })).toBe(false);
  });
});
