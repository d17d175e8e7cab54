/**
 * Readline helpers for the follow-up prompt between turns.
 *
 * Responsibilities:
 * - Create the interactive readline interface on stdin/stdout.
 * - Ask one question and resolve with the trimmed answer, or `null` once the
 *   input has ended (EOF, Ctrl-D).
 *
 * Consumers:
 * - `runCli` reads follow-ups through `createFollowUpReader` unless `--once` is set.
 */

import * as readline from 'node:readline';
import chalk from 'chalk';

export const FOLLOW_UP_PROMPT = 'You (blank line to finish): ';

export interface FollowUpReader {
  ask(prompt?: string): Promise<string | null>;
  close(): void;
}

interface InterfaceStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export function createInterface({
  input = process.stdin,
  output = process.stdout,
}: InterfaceStreams = {}): readline.Interface {
  return readline.createInterface({
    input,
    output,
    terminal: 'isTTY' in input && input.isTTY === true,
  });
}

export async function askHuman(rl: readline.Interface, prompt: string): Promise<string | null> {
  const answer = await new Promise<string | null>((resolve) => {
    const onClose = (): void => resolve(null);
    rl.once('close', onClose);
    rl.question(chalk.bold.blue(prompt), (response: string) => {
      rl.removeListener('close', onClose);
      resolve(response);
    });
  });
  return answer === null ? null : answer.trim();
}

export function createFollowUpReader(streams: InterfaceStreams = {}): FollowUpReader {
  const rl = createInterface(streams);
  let closed = false;
  rl.once('close', () => {
    closed = true;
  });

  return {
    ask(prompt = FOLLOW_UP_PROMPT) {
      return closed ? Promise.resolve(null) : askHuman(rl, prompt);
    },
    close() {
      if (!closed) {
        rl.close();
      }
    },
  };
}
