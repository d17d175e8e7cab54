/**
 * Aggregated library entry for the Bessie core runtime.
 *
 * Responsibilities:
 * - Load `.env` once so vendor keys and token limits are visible to backends.
 * - Provide a CLI-agnostic export surface: message contracts, backends,
 *   the conversation wrapper and the timeout/retry utilities.
 */

import 'dotenv/config';

export {
  SENDERS,
  isSender,
  createMessage,
  systemMessage,
  environmentMessage,
  agentMessage,
  createRequest,
} from '../contracts/index.js';
export type { Message, Sender, Request, RequestOptions } from '../contracts/index.js';

export { BaseBackend } from '../backends/backend.js';
export type { Backend, BaseBackendOptions } from '../backends/backend.js';
export { ChatBackend, condenseMessages, lookupRole } from '../backends/chatBackend.js';
export type { ChatPrompt, RoleTable, WireMessage } from '../backends/chatBackend.js';
export { DummyChat, DUMMY_RESPONSE } from '../backends/dummyChat.js';
export { VendorChat, DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from '../backends/vendorChat.js';
export type { GenerateCall, TextGenerator, VendorChatOptions } from '../backends/vendorChat.js';
export { OpenAIChat, OPENAI_ROLES, generateOpenAIChat } from '../backends/openaiChat.js';
export type { OpenAIChatOptions } from '../backends/openaiChat.js';
export {
  AnthropicChat,
  ANTHROPIC_ROLES,
  ANTHROPIC_COMPLETION_CUE,
  formatAnthropicPrompt,
  generateAnthropicCompletion,
} from '../backends/anthropicChat.js';
export type { AnthropicChatOptions, AnthropicRole } from '../backends/anthropicChat.js';
export {
  createTiktokenCounter,
  countAnthropicTokens,
  encodingNameForModel,
} from '../backends/tokenCounting.js';
export type { TokenCounter } from '../backends/tokenCounting.js';
export { createBackend } from '../backends/selection.js';
export type { BackendSelectionOptions } from '../backends/selection.js';

export { Wrapper, ChatWrapper } from '../wrappers/wrapper.js';

export {
  BessieError,
  ConfigurationError,
  InvalidRoleError,
  TimeoutError,
  BackendError,
  describeError,
} from '../errors.js';

export { withTimeout, currentTimeoutSignal } from '../utils/timeout.js';
export { retryWithBackoff } from '../utils/retry.js';
export type { RetryOptions } from '../utils/retry.js';
export { createConsoleLogger, formatDebugPayload } from '../utils/logger.js';
export type { Logger, ConsoleLoggerOptions } from '../utils/logger.js';

export {
  DEFAULT_TOKEN_LIMIT,
  resolveTokenLimit,
  resolveRetrySettings,
  resolveRequestTimeoutSec,
} from '../config/settings.js';
export type { RetrySettings, Vendor } from '../config/settings.js';

export { getStartupFlags, getDebugFlag, setStartupFlags } from './startupFlags.js';
export type { StartupFlags, StartupFlagOverrides } from './startupFlags.js';

export { getOpenAIProvider, resetOpenAIProvider } from '../providers/openai.js';
export { getAnthropicProvider, resetAnthropicProvider } from '../providers/anthropic.js';
