/**
 * Backend contract shared by every vendor adapter.
 *
 * Responsibilities:
 * - `run` turns one generic request into the raw completion text.
 * - `batchRun` fans a list of independent requests through `run` and keeps
 *   the results in input order.
 *
 * Consumers:
 * - `ChatWrapper.run` drives one request per conversation turn.
 * - `createBackend` in `./selection.ts` picks the implementation for a model id.
 */

import type { Request } from '../contracts/index.js';

export interface Backend<P = unknown> {
  run(request: Request<P>): Promise<string>;
  batchRun(requests: readonly Request<P>[]): Promise<string[]>;
}

export interface BaseBackendOptions {
  /** Upper bound of in-flight requests during `batchRun`. Defaults to one at a time. */
  concurrency?: number;
}

export abstract class BaseBackend<P> implements Backend<P> {
  protected readonly concurrency: number;

  protected constructor({ concurrency = 1 }: BaseBackendOptions = {}) {
    this.concurrency = Number.isFinite(concurrency) ? Math.max(1, Math.floor(concurrency)) : 1;
  }

  abstract run(request: Request<P>): Promise<string>;

  async batchRun(requests: readonly Request<P>[]): Promise<string[]> {
    const results: string[] = new Array<string>(requests.length);

    if (this.concurrency <= 1) {
      for (let index = 0; index < requests.length; index += 1) {
        results[index] = await this.run(requests[index]);
      }
      return results;
    }

    let cursor = 0;
    const worker = async (): Promise<void> => {
      while (cursor < requests.length) {
        const index = cursor;
        cursor += 1;
        results[index] = await this.run(requests[index]);
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, requests.length) }, () =>
      worker(),
    );
    await Promise.all(workers);
    return results;
  }
}
