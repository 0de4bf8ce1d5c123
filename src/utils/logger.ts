import type { OutputStream } from '../types.js';

// ANSI color codes
const COLORS = {
  reset: '\x1b[0m',
  yellow: '\x1b[33m',
  green: '\x1b[32m',
  red: '\x1b[31m',
  dim: '\x1b[2m',
};

export type Color = Exclude<keyof typeof COLORS, 'reset'>;

export interface LoggerOptions {
  stdout: OutputStream;
  stderr: OutputStream;
  verbose?: boolean;
}

/**
 * Line-oriented console output. `debug` lines only appear in verbose mode;
 * colors are applied only when the target stream is a terminal.
 */
export class Logger {
  readonly verbose: boolean;
  private readonly stdout: OutputStream;
  private readonly stderr: OutputStream;

  constructor(options: LoggerOptions) {
    this.stdout = options.stdout;
    this.stderr = options.stderr;
    this.verbose = options.verbose ?? false;
  }

  info(message: string, color?: Color): void {
    this.stdout.write(`${this.paint(this.stdout, message, color)}\n`);
  }

  debug(message: string): void {
    if (!this.verbose) return;
    this.stdout.write(`${this.paint(this.stdout, message, 'dim')}\n`);
  }

  warn(message: string): void {
    this.stderr.write(`${this.paint(this.stderr, `Warning: ${message}`, 'yellow')}\n`);
  }

  error(message: string): void {
    this.stderr.write(`${this.paint(this.stderr, `Error: ${message}`, 'red')}\n`);
  }

  private paint(stream: OutputStream, text: string, color?: Color): string {
    if (!color || !stream.isTTY) return text;
    return `${COLORS[color]}${text}${COLORS.reset}`;
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}
