export {
  SENDERS,
  isSender,
  createMessage,
  systemMessage,
  environmentMessage,
  agentMessage,
} from './message.js';
export type { Message, Sender } from './message.js';
export { createRequest } from './request.js';
export type { Request, RequestOptions } from './request.js';
