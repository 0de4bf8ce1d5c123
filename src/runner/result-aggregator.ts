import * as fs from 'fs';
import type { Job, JobRecord, RunSummary } from '../types.js';
import type { ErrorSink } from '../utils/error-sink.js';
import { type Logger, formatDuration } from '../utils/logger.js';
import { errorMessage } from '../errors.js';

export interface ResultAggregatorOptions {
  total: number;
  logger: Logger;
  errorSink: ErrorSink;
  readLog?: (logPath: string) => Promise<string>;
}

/**
 * Tallies finished jobs in whatever order they complete and routes the
 * captured output of failed jobs to the error sink.
 */
export class ResultAggregator {
  private readonly total: number;
  private readonly logger: Logger;
  private readonly errorSink: ErrorSink;
  private readonly readLog: (logPath: string) => Promise<string>;
  private readonly records: JobRecord[] = [];
  private succeeded = 0;
  private failed = 0;

  constructor(options: ResultAggregatorOptions) {
    this.total = options.total;
    this.logger = options.logger;
    this.errorSink = options.errorSink;
    this.readLog =
      options.readLog ?? ((logPath) => fs.promises.readFile(logPath, 'utf-8'));
  }

  started(job: Job): void {
    this.logger.debug(
      `[${job.id}/${this.total}] Running: ${job.target.entryPointName} in ${job.target.sourceFile}`,
    );
  }

  async record(job: Job): Promise<void> {
    if (job.state !== 'succeeded' && job.state !== 'failed') {
      throw new Error(
        `Job ${job.id} reported before reaching a terminal state (${job.state})`,
      );
    }

    const durationMs =
      job.startedAt !== undefined && job.finishedAt !== undefined
        ? job.finishedAt - job.startedAt
        : 0;

    this.records.push({
      modulePath: job.target.modulePath,
      entryPointName: job.target.entryPointName,
      sourceFile: job.target.sourceFile,
      status: job.state,
      exitCode: job.exitCode ?? null,
      durationMs,
      ...(job.error !== undefined ? { error: job.error } : {}),
    });

    if (job.state === 'succeeded') {
      this.succeeded++;
      this.logger.debug(
        `  ✓ PASSED ${job.target.entryPointName} (${formatDuration(durationMs)})`,
      );
    } else {
      this.failed++;
      this.logger.debug(
        `  ✗ FAILED ${job.target.entryPointName} (${formatDuration(durationMs)})`,
      );
      try {
        await this.errorSink.write(await this.failureText(job));
      } catch (error) {
        this.logger.warn(`Could not append to error file: ${errorMessage(error)}`);
      }
    }

    const completed = this.succeeded + this.failed;
    this.logger.info(
      `Progress: ${completed}/${this.total} completed, ${this.failed} failed, ${this.total - completed} remaining`,
    );
  }

  summarize(options: {
    skipped: number;
    interrupted: boolean;
    durationMs: number;
  }): RunSummary {
    return {
      total: this.total,
      succeeded: this.succeeded,
      failed: this.failed,
      skipped: options.skipped,
      interrupted: options.interrupted,
      durationMs: options.durationMs,
    };
  }

  get results(): JobRecord[] {
    return [...this.records];
  }

  private async failureText(job: Job): Promise<string> {
    const reason =
      job.error !== undefined
        ? `could not launch: ${job.error}`
        : `exit code ${job.exitCode ?? 'unknown'}`;
    const header = `FAILED: ${job.target.entryPointName} in ${job.target.sourceFile} (${reason})`;

    let body: string;
    try {
      body = (await this.readLog(job.logPath)).trimEnd();
    } catch (error) {
      body = `(log unavailable: ${errorMessage(error)})`;
    }

    return body ? `${header}\n${body}\n---\n` : `${header}\n---\n`;
  }
}
