/**
 * Common `run` pipeline for the remote chat backends.
 *
 * Responsibilities:
 * - Condense the prompt, map senders onto the vendor's role table and drop the
 *   oldest droppable message until the request fits the context budget.
 * - Send the formatted payload under a scoped deadline, either once or through
 *   the fixed-backoff retry loop.
 * - Log the outgoing payload and the raw completion.
 *
 * Subclasses supply the vendor specifics: role table, token accounting, which
 * message truncation may drop, wire formatting, transport and post-processing.
 */

import type { Request } from '../contracts/index.js';
import {
  resolveRetrySettings,
  resolveTokenLimit,
  type RetrySettings,
  type Vendor,
} from '../config/settings.js';
import { BackendError, TimeoutError, describeError } from '../errors.js';
import { createConsoleLogger, formatDebugPayload, type Logger } from '../utils/logger.js';
import { retryWithBackoff } from '../utils/retry.js';
import { withTimeout } from '../utils/timeout.js';
import {
  ChatBackend,
  lookupRole,
  type ChatPrompt,
  type RoleTable,
  type WireMessage,
} from './chatBackend.js';
import type { BaseBackendOptions } from './backend.js';
import type { TokenCounter } from './tokenCounting.js';

export const DEFAULT_TEMPERATURE = 1;
export const DEFAULT_MAX_TOKENS = 1024;

export interface GenerateCall<Payload> {
  model: string;
  payload: Payload;
  temperature: number;
  maxTokens: number;
  stop: readonly string[] | undefined;
  signal: AbortSignal;
}

export type TextGenerator<Payload> = (call: GenerateCall<Payload>) => Promise<string>;

export interface VendorChatOptions<Payload> extends BaseBackendOptions {
  temperature?: number;
  maxTokens?: number;
  /** Total context budget. `undefined` reads the vendor's environment variable; `null` disables truncation. */
  tokenLimit?: number | null;
  /** Route requests through the retry loop instead of a single attempt. */
  retry?: boolean;
  retrySettings?: Partial<RetrySettings>;
  /** Deadline of the single-attempt path, in seconds. */
  timeoutSec?: number;
  tokenCounter?: TokenCounter;
  generate?: TextGenerator<Payload>;
  logger?: Logger | null;
}

export abstract class VendorChat<Role extends string, Payload> extends ChatBackend {
  readonly model: string;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly tokenLimit: number | null;
  readonly retry: boolean;

  protected readonly retrySettings: RetrySettings;
  protected readonly timeoutSec: number;
  protected readonly tokenCounter: TokenCounter;
  protected readonly logger: Logger | null;

  private readonly generate: TextGenerator<Payload>;

  protected abstract readonly label: string;
  protected abstract readonly roles: RoleTable<Role>;

  protected constructor(
    vendor: Vendor,
    model: string,
    defaults: { timeoutSec: number; tokenCounter: TokenCounter; generate: TextGenerator<Payload> },
    options: VendorChatOptions<Payload> = {},
  ) {
    super(options);
    this.model = model;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.tokenLimit =
      typeof options.tokenLimit === 'undefined' ? resolveTokenLimit(vendor) : options.tokenLimit;
    this.retry = Boolean(options.retry);
    this.retrySettings = { ...resolveRetrySettings(), ...options.retrySettings };
    this.timeoutSec = options.timeoutSec ?? defaults.timeoutSec;
    this.tokenCounter = options.tokenCounter ?? defaults.tokenCounter;
    this.generate = options.generate ?? defaults.generate;
    this.logger = typeof options.logger === 'undefined' ? createConsoleLogger() : options.logger;
  }

  /** Tokens the request would occupy, including any vendor framing. */
  abstract countTokens(messages: readonly WireMessage<Role>[]): number;

  /** Index of the message truncation drops next, or -1 when nothing may be dropped. */
  protected abstract selectDropIndex(messages: readonly WireMessage<Role>[]): number;

  protected abstract format(messages: readonly WireMessage<Role>[]): Payload;

  protected finalizeResponse(text: string): string {
    return text;
  }

  toWireMessages(prompt: ChatPrompt): WireMessage<Role>[] {
    return this.condenseMessages(prompt).map((message) => ({
      role: lookupRole(this.roles, message.sender),
      content: message.content,
    }));
  }

  /**
   * Drops messages while the accounted size reaches `tokenLimit - maxTokens`.
   * The most recent message always survives; when nothing else can go the
   * request is sent over budget and the vendor decides.
   */
  truncateMessages(messages: readonly WireMessage<Role>[]): WireMessage<Role>[] {
    const kept = [...messages];
    if (this.tokenLimit === null) {
      return kept;
    }

    const budget = this.tokenLimit - this.maxTokens;
    while (kept.length > 0 && this.countTokens(kept) >= budget) {
      const index = this.selectDropIndex(kept);
      if (index < 0 || index >= kept.length - 1) {
        break;
      }
      kept.splice(index, 1);
    }
    return kept;
  }

  async run(request: Request<ChatPrompt>): Promise<string> {
    const messages = this.truncateMessages(this.toWireMessages(request.prompt));
    const payload = this.format(messages);

    this.logger?.info?.(`Sending request to ${this.label}:\n${formatDebugPayload(payload)}`);

    const responseText = await this.send(payload, request.stop);
    this.logger?.info?.(`Received response from ${this.label}: "${responseText}"`);
    return this.finalizeResponse(responseText);
  }

  private async send(payload: Payload, stop: readonly string[] | undefined): Promise<string> {
    const call = (signal: AbortSignal): Promise<string> =>
      this.generate({
        model: this.model,
        payload,
        temperature: this.temperature,
        maxTokens: this.maxTokens,
        stop,
        signal,
      });
    const timeoutMessage = `${this.label} timed out!`;

    if (this.retry) {
      const { attempts, backoffMs, timeoutSec } = this.retrySettings;
      return retryWithBackoff({
        label: this.label,
        attempts,
        backoffMs,
        logger: this.logger,
        operation: () => withTimeout(timeoutSec, timeoutMessage, call),
      });
    }

    try {
      return await withTimeout(this.timeoutSec, timeoutMessage, call);
    } catch (error) {
      if (error instanceof TimeoutError || error instanceof BackendError) {
        throw error;
      }
      throw new BackendError(`${this.label} request failed: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}
