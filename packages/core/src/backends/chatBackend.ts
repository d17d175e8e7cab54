/**
 * Shared machinery for backends whose prompt is a message sequence.
 *
 * Responsibilities:
 * - Condense consecutive same-sender messages before vendor formatting.
 * - Translate logical senders into a vendor's wire roles.
 */

import { isSender, type Message, type Sender } from '../contracts/index.js';
import { InvalidRoleError } from '../errors.js';
import { BaseBackend, type BaseBackendOptions } from './backend.js';

export type ChatPrompt = readonly Message[];

export type RoleTable<Role extends string> = Readonly<Record<Sender, Role>>;

export interface WireMessage<Role extends string> {
  role: Role;
  content: string;
}

/**
 * Merges each run of consecutive messages from the same sender into a single
 * message whose content is the concatenation of the run, trimmed. Every run is
 * kept, so applying the pass twice yields the same sequence.
 */
export function condenseMessages(messages: readonly Message[]): Message[] {
  const condensed: Message[] = [];
  let currentSender: Sender | null = null;
  let currentContent = '';

  for (const message of messages) {
    if (!message.sender) {
      throw new InvalidRoleError('', 'Message sender must not be empty.');
    }

    if (message.sender === currentSender) {
      currentContent += message.content;
      continue;
    }

    if (currentSender !== null) {
      condensed.push(Object.freeze({ sender: currentSender, content: currentContent.trim() }));
    }
    currentSender = message.sender;
    currentContent = message.content;
  }

  if (currentSender !== null) {
    condensed.push(Object.freeze({ sender: currentSender, content: currentContent.trim() }));
  }

  return condensed;
}

export function lookupRole<Role extends string>(table: RoleTable<Role>, sender: string): Role {
  if (!isSender(sender) || !Object.prototype.hasOwnProperty.call(table, sender)) {
    throw new InvalidRoleError(sender);
  }

  return table[sender];
}

export abstract class ChatBackend extends BaseBackend<ChatPrompt> {
  protected constructor(options: BaseBackendOptions = {}) {
    super(options);
  }

  protected condenseMessages(messages: readonly Message[]): Message[] {
    return condenseMessages(messages);
  }
}
