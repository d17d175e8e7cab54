/**
 * OpenAI provider factory shared by the chat backends.
 *
 * Responsibilities:
 * - Lazily instantiate and memoize the AI SDK OpenAI provider.
 * - Pass `OPENAI_API_KEY` through untouched: a missing key surfaces when the
 *   first request is sent, not when a backend is constructed.
 *
 * Consumers:
 * - `backends/openaiChat.ts` resolves chat models through `getOpenAIProvider()`.
 * - Tests call `resetOpenAIProvider()` when they need a clean slate.
 */

import { createOpenAI, type OpenAIProvider } from '@ai-sdk/openai';

import { ConfigurationError, describeError } from '../errors.js';

let memoizedProvider: OpenAIProvider | null = null;

export function getOpenAIProvider(): OpenAIProvider {
  if (!memoizedProvider) {
    const clientOptions = {
      apiKey: process.env.OPENAI_API_KEY,
      baseURL: resolveBaseURL(process.env.OPENAI_BASE_URL),
    } satisfies Parameters<typeof createOpenAI>[0];

    memoizedProvider = createOpenAI(clientOptions);
  }
  return memoizedProvider;
}

export function resetOpenAIProvider(): void {
  memoizedProvider = null;
}

function resolveBaseURL(rawValue: string | undefined): string | undefined {
  if (!rawValue) {
    return undefined;
  }

  let parsed: URL;
  try {
    parsed = new URL(rawValue);
  } catch (error) {
    throw new ConfigurationError(`OPENAI_BASE_URL must be a valid URL: ${describeError(error)}`);
  }

  if (/\/v1\/(chat\/completions|completions)$/.test(parsed.pathname)) {
    throw new ConfigurationError(
      'OPENAI_BASE_URL should reference the API root (e.g., https://api.openai.com/v1) rather than a specific completions endpoint.',
    );
  }

  return rawValue;
}
