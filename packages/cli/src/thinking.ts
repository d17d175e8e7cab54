/**
 * Spinner shown on interactive terminals while a backend request is in flight.
 */

import * as readline from 'node:readline';
import chalk from 'chalk';

export function formatElapsedTime(startTime: number | null, now: number = Date.now()): string {
  if (!startTime || startTime > now) {
    return '00:00';
  }

  const totalSeconds = Math.floor((now - startTime) / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

const FRAMES = ['⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏', '⠋'] as const;

export interface ProgressIndicator {
  start(): void;
  stop(): void;
}

export interface ThinkingIndicatorOptions {
  stream?: NodeJS.WriteStream;
  label?: string;
  intervalMs?: number;
}

export class ThinkingIndicator implements ProgressIndicator {
  private readonly stream: NodeJS.WriteStream;
  private readonly label: string;
  private readonly intervalMs: number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private startedAt: number | null = null;
  private frame = 0;

  constructor({
    stream = process.stdout,
    label = ' Waiting for the model',
    intervalMs = 80,
  }: ThinkingIndicatorOptions = {}) {
    this.stream = stream;
    this.label = label;
    this.intervalMs = Math.max(16, intervalMs);
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.startedAt = Date.now();
    this.frame = 0;
    this.timer = setInterval(() => this.render(), this.intervalMs);
  }

  stop(): void {
    if (!this.timer) {
      return;
    }

    clearInterval(this.timer);
    this.timer = null;
    this.startedAt = null;
    readline.clearLine(this.stream, 0);
    readline.cursorTo(this.stream, 0);
  }

  private render(): void {
    const symbol = FRAMES[this.frame % FRAMES.length];
    readline.clearLine(this.stream, 0);
    readline.cursorTo(this.stream, 0);
    this.stream.write(chalk.dim(`${symbol}${this.label} (${formatElapsedTime(this.startedAt)})`));
    this.frame += 1;
  }
}
