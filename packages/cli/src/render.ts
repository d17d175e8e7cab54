/**
 * Terminal formatting for the CLI's own output. Completions are printed as
 * plain text; only headings and status lines are coloured.
 */

import chalk from 'chalk';

export function renderPrompt(prompt: string): string {
  return `${chalk.bold('Prompt:')}\n${prompt}`;
}

export function renderReply(reply: string): string {
  return `${chalk.bold.green('Bessie:')}\n${reply}`;
}

export function renderWarning(message: string): string {
  return chalk.yellow(message);
}

export function renderError(message: string): string {
  return chalk.red(message);
}
