/**
 * Markdown transcript of one CLI session.
 *
 * `start` replaces any previous file with the `## Args` block; every later
 * block is appended with a single write, so turns that completed survive a
 * failure in a later one.
 */

import { appendFile, writeFile } from 'node:fs/promises';

export interface TranscriptArgs {
  request: string;
  patterns: readonly string[];
  model: string;
}

export function formatArgsBlock({ request, patterns, model }: TranscriptArgs): string {
  return [
    '## Args',
    '',
    `- request: ${request}`,
    `- patterns: ${patterns.join(' ')}`,
    `- model: ${model}`,
    '',
    '',
  ].join('\n');
}

export function formatBlock(heading: 'Bessie' | 'You', text: string): string {
  return `## ${heading}\n\n${text.trim()}\n\n`;
}

export class Transcript {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async start(args: TranscriptArgs): Promise<void> {
    await writeFile(this.filePath, formatArgsBlock(args), 'utf8');
  }

  async appendReply(text: string): Promise<void> {
    await appendFile(this.filePath, formatBlock('Bessie', text), 'utf8');
  }

  async appendFollowUp(text: string): Promise<void> {
    await appendFile(this.filePath, formatBlock('You', text), 'utf8');
  }
}
