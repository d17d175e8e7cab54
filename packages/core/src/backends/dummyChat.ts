import type { Request } from '../contracts/index.js';
import { BaseBackend, type BaseBackendOptions } from './backend.js';

export const DUMMY_RESPONSE = 'Moo!';

/** Offline backend: answers every request with {@link DUMMY_RESPONSE}. */
export class DummyChat extends BaseBackend<unknown> {
  constructor(options: BaseBackendOptions = {}) {
    super(options);
  }

  async run(_request: Request<unknown>): Promise<string> {
    return DUMMY_RESPONSE;
  }
}
