import { resolveRequestTimeoutSec } from '../config/settings.js';
import { getOpenAIProvider } from '../providers/openai.js';
import { completeMessages, type ChatRole, type ChatTurn } from '../providers/completion.js';
import type { RoleTable, WireMessage } from './chatBackend.js';
import { createTiktokenCounter } from './tokenCounting.js';
import { VendorChat, type TextGenerator, type VendorChatOptions } from './vendorChat.js';

export const OPENAI_ROLES: RoleTable<ChatRole> = Object.freeze({
  system: 'system',
  environment: 'user',
  agent: 'assistant',
});

// Metadata tokens wrapped around every message, and tokens priming the reply.
const TOKENS_PER_MESSAGE = 4;
const TOKENS_PER_REQUEST = 2;

export type OpenAIChatOptions = VendorChatOptions<ChatTurn[]>;

export const generateOpenAIChat: TextGenerator<ChatTurn[]> = ({
  model,
  payload,
  temperature,
  maxTokens,
  stop,
  signal,
}) =>
  completeMessages({
    model: getOpenAIProvider().chat(model),
    messages: payload,
    temperature,
    maxOutputTokens: maxTokens,
    stopSequences: stop,
    abortSignal: signal,
  });

/**
 * Chat completion backend for OpenAI models. Sends structured role/content
 * pairs and returns the completion text untouched.
 */
export class OpenAIChat extends VendorChat<ChatRole, ChatTurn[]> {
  protected readonly label = 'OpenAI API';
  protected readonly roles = OPENAI_ROLES;

  constructor(model: string, options: OpenAIChatOptions = {}) {
    super(
      'openai',
      model,
      {
        timeoutSec: resolveRequestTimeoutSec('openai'),
        tokenCounter: createTiktokenCounter(model),
        generate: generateOpenAIChat,
      },
      options,
    );
  }

  countTokens(messages: readonly WireMessage<ChatRole>[]): number {
    let total = messages.length * TOKENS_PER_MESSAGE + TOKENS_PER_REQUEST;
    for (const message of messages) {
      total += this.tokenCounter(message.content);
    }
    return total;
  }

  /** System messages are never dropped; the oldest other message goes first. */
  protected selectDropIndex(messages: readonly WireMessage<ChatRole>[]): number {
    return messages.findIndex((message) => message.role !== 'system');
  }

  protected format(messages: readonly WireMessage<ChatRole>[]): ChatTurn[] {
    return messages.map(({ role, content }) => ({ role, content }));
  }
}
