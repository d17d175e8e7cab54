/**
 * Thin wrappers around the AI SDK's `generateText` for the two wire shapes the
 * backends produce: a role-tagged message list and a single flattened prompt.
 *
 * The SDK's built-in retries are disabled; the backends own their retry policy.
 */

import { generateText, type LanguageModel, type ModelMessage } from 'ai';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

interface CompletionSettings {
  temperature: number;
  maxOutputTokens: number;
  stopSequences?: readonly string[];
  abortSignal?: AbortSignal;
}

export interface MessageCompletionParams extends CompletionSettings {
  model: LanguageModel;
  messages: readonly ChatTurn[];
}

export interface PromptCompletionParams extends CompletionSettings {
  model: LanguageModel;
  prompt: string;
}

export function toModelMessage(turn: ChatTurn): ModelMessage {
  switch (turn.role) {
    case 'system':
      return { role: 'system', content: turn.content };
    case 'user':
      return { role: 'user', content: turn.content };
    case 'assistant':
      return { role: 'assistant', content: turn.content };
  }
}

function buildCallSettings({
  temperature,
  maxOutputTokens,
  stopSequences,
  abortSignal,
}: CompletionSettings) {
  return {
    temperature,
    maxOutputTokens,
    stopSequences: stopSequences && stopSequences.length > 0 ? [...stopSequences] : undefined,
    abortSignal,
    maxRetries: 0,
  };
}

export async function completeMessages({
  model,
  messages,
  ...settings
}: MessageCompletionParams): Promise<string> {
  const result = await generateText({
    model,
    messages: messages.map(toModelMessage),
    ...buildCallSettings(settings),
  });

  return typeof result.text === 'string' ? result.text : '';
}

export async function completePrompt({
  model,
  prompt,
  ...settings
}: PromptCompletionParams): Promise<string> {
  const result = await generateText({
    model,
    prompt,
    ...buildCallSettings(settings),
  });

  return typeof result.text === 'string' ? result.text : '';
}
