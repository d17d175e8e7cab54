/**
 * Conversation wrappers translate application observations into backend
 * prompts and raw completions back into application actions.
 *
 * `ChatWrapper` owns the message history of one session. An agent reply is
 * held as the pending action after `parse` and only committed to history when
 * the next `prompt` begins, so callers can inspect or display it first.
 */

import {
  agentMessage,
  createRequest,
  environmentMessage,
  systemMessage,
  type Message,
  type RequestOptions,
} from '../contracts/index.js';
import type { Backend } from '../backends/backend.js';

export abstract class Wrapper<Observation, Prompt, Action> {
  /** Given an observation, return a prompt for the agent. */
  prompt(observation: Observation): Prompt {
    return this.buildPrompt(observation);
  }

  /** Given a raw completion, return a legal action for the environment. */
  parse(action: string): Action {
    return this.interpretAction(action);
  }

  async run(
    backend: Backend<Prompt>,
    observation: Observation,
    options: RequestOptions = {},
  ): Promise<Action> {
    const prompt = this.prompt(observation);
    const response = await backend.run(createRequest(prompt, options));
    return this.parse(response);
  }

  reset(): void {}

  protected abstract buildPrompt(observation: Observation): Prompt;

  protected abstract interpretAction(action: string): Action;
}

export class ChatWrapper extends Wrapper<string, readonly Message[], string> {
  private readonly systemMessage: string | null;
  private messages: Message[] = [];
  private lastAction: Message | null = null;

  constructor(systemMessage: string | null = null) {
    super();
    this.systemMessage = systemMessage;
    this.reset();
  }

  get history(): readonly Message[] {
    return this.messages;
  }

  get pendingAction(): Message | null {
    return this.lastAction;
  }

  prompt(observation: string): readonly Message[] {
    if (this.lastAction !== null) {
      this.messages.push(this.lastAction);
      this.lastAction = null;
    }
    return super.prompt(observation);
  }

  /**
   * Overwrites any pending action; callers must `prompt` before parsing the
   * next completion or the earlier one is lost.
   */
  parse(action: string): string {
    this.lastAction = agentMessage(`${action.trim()}\n`);
    return super.parse(action);
  }

  reset(): void {
    this.messages = [];
    this.lastAction = null;
    if (this.systemMessage !== null) {
      this.messages.push(systemMessage(this.systemMessage.trim()));
    }
  }

  /** Splits one observation into the environment messages appended for it. */
  protected toEnvironmentContents(observation: string): string[] {
    return [observation];
  }

  protected buildPrompt(observation: string): readonly Message[] {
    for (const content of this.toEnvironmentContents(observation)) {
      this.messages.push(environmentMessage(content));
    }
    return this.messages;
  }

  protected interpretAction(action: string): string {
    return action;
  }
}
