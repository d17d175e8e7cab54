/**
 * Error hierarchy shared by the backends, the conversation wrapper and the CLI.
 *
 * Every failure terminates the current turn; callers narrow with `instanceof`
 * to decide how to report it.
 */

export class BessieError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unknown model identifiers and malformed environment values. */
export class ConfigurationError extends BessieError {}

/** A message sender that is empty or has no mapping in the vendor's role table. */
export class InvalidRoleError extends BessieError {
  readonly sender: string;

  constructor(sender: string, message?: string) {
    super(message ?? `No vendor role is mapped to sender "${sender}".`);
    this.sender = sender;
  }
}

export class TimeoutError extends BessieError {}

/** Retries exhausted, or a vendor call that failed for a reason other than a deadline. */
export class BackendError extends BessieError {}

/**
 * Matches anything shaped like an error, including errors created in another
 * realm (a `vm` context, a worker) that fail `instanceof Error`.
 */
function hasMessage(value: unknown): value is { message: string } {
  return (
    typeof value === 'object' && value !== null && 'message' in value && typeof value.message === 'string'
  );
}

export function describeError(error: unknown): string {
  if (hasMessage(error) && error.message) {
    return error.message;
  }

  return String(error);
}

export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }

  return new Error(describeError(value), { cause: value });
}
