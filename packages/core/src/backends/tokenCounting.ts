/**
 * Vendor tokenizers.
 *
 * OpenAI models are measured with `js-tiktoken` using the encoding that matches
 * the model family; Anthropic prompts with `@anthropic-ai/tokenizer`. Both are
 * exposed as plain `(text) => count` functions so backends can take a
 * replacement through their options.
 */

import { countTokens as countClaudeTokens } from '@anthropic-ai/tokenizer';
import { getEncoding, type Tiktoken, type TiktokenEncoding } from 'js-tiktoken';

export type TokenCounter = (text: string) => number;

const O200K_MODEL_PATTERNS = [/^gpt-4o/, /^gpt-4\.1/, /^gpt-4\.5/, /^gpt-5/, /^o\d/, /^chatgpt-4o/];

const encoders = new Map<TiktokenEncoding, Tiktoken>();

export function encodingNameForModel(model: string): TiktokenEncoding {
  const normalized = model.trim().toLowerCase();
  return O200K_MODEL_PATTERNS.some((pattern) => pattern.test(normalized))
    ? 'o200k_base'
    : 'cl100k_base';
}

function getEncoder(name: TiktokenEncoding): Tiktoken {
  let encoder = encoders.get(name);
  if (!encoder) {
    encoder = getEncoding(name);
    encoders.set(name, encoder);
  }
  return encoder;
}

export function createTiktokenCounter(model: string): TokenCounter {
  const encodingName = encodingNameForModel(model);
  // Special-token text inside user files is counted as ordinary text.
  return (text) => getEncoder(encodingName).encode(text, [], []).length;
}

export const countAnthropicTokens: TokenCounter = (text) => countClaudeTokens(text);
