import * as fs from 'fs';
import type { OutputStream } from '../types.js';

export interface ErrorSinkOptions {
  stream: OutputStream;
  errorLogPath?: string;
}

/**
 * Failure text goes to the interactive error stream and, when configured,
 * is appended to an error log. Writes are chained so each message lands as
 * one contiguous unit in both destinations.
 */
export class ErrorSink {
  private readonly stream: OutputStream;
  private readonly errorLogPath?: string;
  private pending: Promise<void> = Promise.resolve();

  constructor(options: ErrorSinkOptions) {
    this.stream = options.stream;
    this.errorLogPath = options.errorLogPath;
  }

  write(text: string): Promise<void> {
    const unit = text.endsWith('\n') ? text : `${text}\n`;
    const next = this.pending.then(() => this.writeUnit(unit));
    // A failed append rejects this call only; later writes still run.
    this.pending = next.catch(() => undefined);
    return next;
  }

  /** Resolves once every write issued so far has finished. */
  flush(): Promise<void> {
    return this.pending;
  }

  private async writeUnit(unit: string): Promise<void> {
    this.stream.write(unit);
    if (this.errorLogPath) {
      await fs.promises.appendFile(this.errorLogPath, unit);
    }
  }
}
