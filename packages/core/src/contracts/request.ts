/**
 * Generic backend invocation. Chat backends take a message sequence as the
 * prompt; the dummy backend accepts any payload.
 */
export interface Request<P> {
  readonly prompt: P;
  readonly stop?: readonly string[];
}

export interface RequestOptions {
  stop?: readonly string[] | null;
}

export function createRequest<P>(prompt: P, options: RequestOptions = {}): Request<P> {
  if (Array.isArray(options.stop)) {
    return Object.freeze({ prompt, stop: Object.freeze([...options.stop]) });
  }

  return Object.freeze({ prompt });
}
