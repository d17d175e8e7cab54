import { InvalidRoleError } from '../errors.js';

export const SENDERS = ['system', 'environment', 'agent'] as const;

export type Sender = (typeof SENDERS)[number];

/** A single conversational turn. Frozen once created. */
export interface Message {
  readonly sender: Sender;
  readonly content: string;
}

export function isSender(value: unknown): value is Sender {
  return typeof value === 'string' && (SENDERS as readonly string[]).includes(value);
}

export function createMessage(sender: string, content: string): Message {
  if (!isSender(sender)) {
    throw new InvalidRoleError(
      sender,
      sender ? `Unknown message sender "${sender}".` : 'Message sender must not be empty.',
    );
  }

  return Object.freeze({ sender, content: String(content) });
}

export const systemMessage = (content: string): Message => createMessage('system', content);

export const environmentMessage = (content: string): Message =>
  createMessage('environment', content);

export const agentMessage = (content: string): Message => createMessage('agent', content);
