/**
 * Anthropic provider factory, memoized the same way as the OpenAI one.
 * `ANTHROPIC_API_KEY` is passed through as-is; the SDK rejects a missing key
 * at call time.
 */

import { createAnthropic, type AnthropicProvider } from '@ai-sdk/anthropic';

let memoizedProvider: AnthropicProvider | null = null;

export function getAnthropicProvider(): AnthropicProvider {
  if (!memoizedProvider) {
    memoizedProvider = createAnthropic({
      apiKey: process.env.ANTHROPIC_API_KEY,
      baseURL: process.env.ANTHROPIC_BASE_URL || undefined,
    });
  }
  return memoizedProvider;
}

export function resetAnthropicProvider(): void {
  memoizedProvider = null;
}
