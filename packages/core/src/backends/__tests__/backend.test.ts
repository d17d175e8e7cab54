/* eslint-env jest */
import { describe, expect, test } from '@jest/globals';

import { createRequest, type Request } from '../../contracts/index.js';
import { BaseBackend, type BaseBackendOptions } from '../backend.js';
import { DUMMY_RESPONSE, DummyChat } from '../dummyChat.js';

class DelayedEcho extends BaseBackend<number> {
  active = 0;
  peak = 0;

  constructor(options: BaseBackendOptions = {}) {
    super(options);
  }

  async run(request: Request<number>): Promise<string> {
    this.active += 1;
    this.peak = Math.max(this.peak, this.active);
    await new Promise((resolve) => setTimeout(resolve, request.prompt));
    this.active -= 1;
    return `r${request.prompt}`;
  }
}

const delays = [20, 5, 10, 1].map((delay) => createRequest(delay));

describe('DummyChat', () => {
  test('answers every request with the canned response', async () => {
    const backend = new DummyChat();

    await expect(backend.run(createRequest([]))).resolves.toBe(DUMMY_RESPONSE);
    await expect(
      backend.batchRun([createRequest('a'), createRequest('b'), createRequest('c')]),
    ).resolves.toEqual(['Moo!', 'Moo!', 'Moo!']);
  });
});

describe('BaseBackend.batchRun', () => {
  test('runs requests one at a time by default', async () => {
    const backend = new DelayedEcho();

    await expect(backend.batchRun(delays)).resolves.toEqual(['r20', 'r5', 'r10', 'r1']);
    expect(backend.peak).toBe(1);
  });

  test('keeps input order when requests run concurrently', async () => {
    const backend = new DelayedEcho({ concurrency: 2 });

    await expect(backend.batchRun(delays)).resolves.toEqual(['r20', 'r5', 'r10', 'r1']);
    expect(backend.peak).toBe(2);
  });

  test('returns an empty list for an empty batch', async () => {
    await expect(new DelayedEcho({ concurrency: 4 }).batchRun([])).resolves.toEqual([]);
  });
});
