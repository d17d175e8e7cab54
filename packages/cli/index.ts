/**
 * Public entry point for the Bessie CLI package.
 *
 * Responsibilities:
 * - Re-export the core runtime so programmatic consumers need one import.
 * - Surface the CLI building blocks (file collection, prompt rendering,
 *   transcript, follow-up reader, session loop) and the `runCli` entry.
 */

export * from '@bessie/core';

export { collectFiles } from './src/files.js';
export type { CollectedFiles, SourceFile } from './src/files.js';
export {
  DEFAULT_PROMPT_TEMPLATE,
  compilePromptTemplate,
  loadPromptTemplate,
} from './src/promptTemplate.js';
export type { PromptContext, PromptRenderer } from './src/promptTemplate.js';
export { Transcript, formatArgsBlock, formatBlock } from './src/transcript.js';
export type { TranscriptArgs } from './src/transcript.js';
export { askHuman, createFollowUpReader, createInterface, FOLLOW_UP_PROMPT } from './src/io.js';
export type { FollowUpReader } from './src/io.js';
export { ThinkingIndicator, formatElapsedTime } from './src/thinking.js';
export type { ProgressIndicator } from './src/thinking.js';
export { runSession } from './src/session.js';
export type { SessionOptions } from './src/session.js';
export {
  DEFAULT_MODEL,
  DEFAULT_OUTPUT,
  DEFAULT_SYSTEM_MESSAGE,
  createProgram,
  parseCommandLine,
  runCli,
} from './src/runner.js';
export type { CliDependencies, CliFlags, CliIo, ParsedCommandLine } from './src/runner.js';
