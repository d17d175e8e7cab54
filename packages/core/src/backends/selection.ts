import { ConfigurationError } from '../errors.js';
import type { Backend } from './backend.js';
import type { ChatPrompt } from './chatBackend.js';
import { AnthropicChat, type AnthropicChatOptions } from './anthropicChat.js';
import { DummyChat } from './dummyChat.js';
import { OpenAIChat, type OpenAIChatOptions } from './openaiChat.js';

export interface BackendSelectionOptions {
  openai?: OpenAIChatOptions;
  anthropic?: AnthropicChatOptions;
}

/**
 * Picks the backend for a model identifier by substring: `dummy`, then `gpt`,
 * then `claude`. Anything else is rejected before a client is created.
 */
export function createBackend(
  model: string,
  options: BackendSelectionOptions = {},
): Backend<ChatPrompt> {
  const normalized = model.trim();

  if (normalized.includes('dummy')) {
    return new DummyChat();
  }

  if (normalized.includes('gpt')) {
    return new OpenAIChat(normalized, options.openai);
  }

  if (normalized.includes('claude')) {
    return new AnthropicChat(normalized, options.anthropic);
  }

  throw new ConfigurationError(
    `Unsupported model "${model}". Use a model id containing "gpt" or "claude", or "dummy" for offline runs.`,
  );
}
