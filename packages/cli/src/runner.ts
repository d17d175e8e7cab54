/**
 * CLI bootstrap: parses the command line, builds the opening prompt and runs
 * the conversation.
 *
 * Exit codes: 0 on success, 2 for configuration problems (unknown model,
 * malformed environment values, unreadable template), 1 for anything else.
 * Commander's own usage errors keep commander's code.
 */

import * as path from 'node:path';
import { Command, CommanderError, InvalidArgumentError } from 'commander';

import {
  ChatWrapper,
  ConfigurationError,
  createBackend,
  describeError,
  getDebugFlag,
  setStartupFlags,
  type Backend,
  type BackendSelectionOptions,
  type ChatPrompt,
} from '@bessie/core';

import { collectFiles } from './files.js';
import { createFollowUpReader, type FollowUpReader } from './io.js';
import { loadPromptTemplate } from './promptTemplate.js';
import { renderError, renderPrompt, renderReply, renderWarning } from './render.js';
import { runSession } from './session.js';
import { ThinkingIndicator, type ProgressIndicator } from './thinking.js';
import { Transcript } from './transcript.js';

export const DEFAULT_MODEL = 'gpt-4';
export const DEFAULT_SYSTEM_MESSAGE = 'You are a helpful programming assistant.';
export const DEFAULT_OUTPUT = 'bessie.md';

export type CliIo = {
  stdout?: (message: string) => void;
  stderr?: (message: string) => void;
};

type ResolvedCliIo = {
  stdout: (message: string) => void;
  stderr: (message: string) => void;
};

export interface CliDependencies {
  cwd?: string;
  backendFactory?: (model: string, options: BackendSelectionOptions) => Backend<ChatPrompt>;
  followUps?: FollowUpReader;
  indicator?: ProgressIndicator | null;
}

export type CliFlags = {
  model: string;
  temperature: number;
  maxTokens: number;
  system: string;
  template?: string;
  output: string;
  retry: boolean;
  once: boolean;
  debug: boolean;
};

export interface ParsedCommandLine {
  request: string;
  patterns: string[];
  flags: CliFlags;
}

function resolveIo(io?: CliIo): ResolvedCliIo {
  const target = io ?? {};
  const stdout = typeof target.stdout === 'function' ? target.stdout : console.log;
  const stderr = typeof target.stderr === 'function' ? target.stderr : console.error;
  return { stdout, stderr };
}

function parseTemperature(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.');
  }
  return parsed;
}

function parseMaxTokens(value: string): number {
  if (!/^\d+$/.test(value.trim()) || Number(value) <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return Number(value);
}

/** Spinner on interactive terminals, unless debug output would interleave with it. */
function defaultIndicator(): ProgressIndicator | null {
  return process.stdout.isTTY && !getDebugFlag() ? new ThinkingIndicator() : null;
}

export function createProgram(io: ResolvedCliIo): Command {
  return new Command()
    .name('bessie')
    .description('Bessie is a programming assistant')
    .argument('<request>', 'A programming request in natural language')
    .argument('<patterns...>', 'Globs of the files relevant to the request')
    .option('--model <id>', 'model id; "gpt" ids use OpenAI, "claude" ids Anthropic', DEFAULT_MODEL)
    .option('--temperature <n>', 'sampling temperature', parseTemperature, 0)
    .option('--max-tokens <n>', 'completion token limit', parseMaxTokens, 2000)
    .option('--system <text>', 'system message', DEFAULT_SYSTEM_MESSAGE)
    .option('--template <path>', 'Handlebars template for the opening prompt')
    .option('--output <path>', 'transcript file', DEFAULT_OUTPUT)
    .option('--retry', 'retry failed requests with a fixed backoff', false)
    .option('--once', 'stop after the first reply', false)
    .option('--debug', 'log backend requests and responses', false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    });
}

/** Throws `CommanderError` for usage errors and for `--help`. */
export function parseCommandLine(argv: readonly string[], io: CliIo = {}): ParsedCommandLine {
  const program = createProgram(resolveIo(io));
  const positional: { request?: string; patterns?: string[] } = {};

  program.action((request: string, patterns: string[]) => {
    positional.request = request;
    positional.patterns = patterns;
  });
  program.parse([...argv]);

  const { request, patterns } = positional;
  if (typeof request === 'undefined' || typeof patterns === 'undefined') {
    throw new CommanderError(1, 'bessie.noAction', 'No request given.');
  }

  return { request, patterns, flags: program.opts<CliFlags>() };
}

export async function runCli(
  argv: string[] = process.argv,
  io?: CliIo,
  dependencies: CliDependencies = {},
): Promise<number> {
  const resolvedIo = resolveIo(io);
  const exit = (code: number): number => {
    if (code !== 0) {
      process.exitCode = code;
    }
    return code;
  };

  let commandLine: ParsedCommandLine;
  try {
    commandLine = parseCommandLine(argv, resolvedIo);
  } catch (error) {
    if (error instanceof CommanderError) {
      return exit(error.exitCode);
    }
    throw error;
  }

  const { request, patterns, flags } = commandLine;
  const { stdout, stderr } = resolvedIo;
  const cwd = dependencies.cwd ?? process.cwd();

  if (flags.debug) {
    setStartupFlags({ debug: true });
  }

  let followUps: FollowUpReader | null = null;
  try {
    const vendorOptions = {
      temperature: flags.temperature,
      maxTokens: flags.maxTokens,
      retry: flags.retry,
    };
    const backendFactory = dependencies.backendFactory ?? createBackend;
    const backend = backendFactory(flags.model, { openai: vendorOptions, anthropic: vendorOptions });

    const { files, unmatched } = await collectFiles(patterns, { cwd });
    for (const pattern of unmatched) {
      stderr(renderWarning(`No files matched "${pattern}".`));
    }

    const renderPromptText = await loadPromptTemplate(flags.template, cwd);
    const prompt = renderPromptText({ request, files });
    stdout(renderPrompt(prompt));

    const transcript = new Transcript(path.resolve(cwd, flags.output));
    await transcript.start({ request, patterns, model: flags.model });

    const reader = flags.once ? null : (dependencies.followUps ?? createFollowUpReader());
    followUps = reader;

    const indicator =
      typeof dependencies.indicator === 'undefined' ? defaultIndicator() : dependencies.indicator;

    await runSession({
      backend,
      wrapper: new ChatWrapper(flags.system),
      transcript,
      firstObservation: prompt,
      once: flags.once,
      readFollowUp: () => (reader ? reader.ask() : Promise.resolve(null)),
      onReply: (reply) => stdout(renderReply(reply)),
      indicator,
    });

    return exit(0);
  } catch (error) {
    stderr(renderError(describeError(error)));
    return exit(error instanceof ConfigurationError ? 2 : 1);
  } finally {
    followUps?.close();
  }
}
