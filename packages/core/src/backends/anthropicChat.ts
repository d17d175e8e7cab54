import { resolveRequestTimeoutSec } from '../config/settings.js';
import { getAnthropicProvider } from '../providers/anthropic.js';
import { completePrompt } from '../providers/completion.js';
import type { RoleTable, WireMessage } from './chatBackend.js';
import { countAnthropicTokens } from './tokenCounting.js';
import { VendorChat, type TextGenerator, type VendorChatOptions } from './vendorChat.js';

export type AnthropicRole = 'system' | 'Human' | 'Assistant';

export const ANTHROPIC_ROLES: RoleTable<AnthropicRole> = Object.freeze({
  system: 'system',
  environment: 'Human',
  agent: 'Assistant',
});

export const ANTHROPIC_COMPLETION_CUE = '\n\nAssistant:';

export type AnthropicChatOptions = VendorChatOptions<string>;

export const generateAnthropicCompletion: TextGenerator<string> = ({
  model,
  payload,
  temperature,
  maxTokens,
  stop,
  signal,
}) =>
  completePrompt({
    model: getAnthropicProvider()(model),
    prompt: payload,
    temperature,
    maxOutputTokens: maxTokens,
    stopSequences: stop,
    abortSignal: signal,
  });

/**
 * Flattens role-tagged messages into the `Human:` / `Assistant:` transcript
 * format. System messages are left out.
 */
export function formatAnthropicPrompt(messages: readonly WireMessage<AnthropicRole>[]): string {
  return (
    messages
      .filter((message) => message.role !== 'system')
      .map((message) => `\n\n${message.role}: ${message.content}`)
      .join('') + ANTHROPIC_COMPLETION_CUE
  );
}

/**
 * Backend for Anthropic models. The conversation travels as one flattened
 * prompt, truncation always drops the oldest message, and the completion is
 * trimmed before it is returned.
 */
export class AnthropicChat extends VendorChat<AnthropicRole, string> {
  protected readonly label = 'Anthropic API';
  protected readonly roles = ANTHROPIC_ROLES;

  constructor(model: string, options: AnthropicChatOptions = {}) {
    super(
      'anthropic',
      model,
      {
        timeoutSec: resolveRequestTimeoutSec('anthropic'),
        tokenCounter: countAnthropicTokens,
        generate: generateAnthropicCompletion,
      },
      options,
    );
  }

  countTokens(messages: readonly WireMessage<AnthropicRole>[]): number {
    return this.tokenCounter(formatAnthropicPrompt(messages));
  }

  protected selectDropIndex(messages: readonly WireMessage<AnthropicRole>[]): number {
    return messages.length > 0 ? 0 : -1;
  }

  protected format(messages: readonly WireMessage<AnthropicRole>[]): string {
    return formatAnthropicPrompt(messages);
  }

  protected finalizeResponse(text: string): string {
    return text.trim();
  }
}
