import type { Job, Target, TestRunner } from '../types.js';
import { errorMessage } from '../errors.js';
import { CompletionChannel } from './completion-channel.js';

export type AdmissionStopReason = 'failure' | 'interrupt';

export interface SchedulerListener {
  onJobStarted?(job: Job): void | Promise<void>;
  onJobFinished?(job: Job): void | Promise<void>;
  onAdmissionClosed?(reason: AdmissionStopReason, job?: Job): void;
}

export interface JobSchedulerOptions {
  runner: TestRunner;
  maxParallelJobs: number;
  perTargetDuration: number;
  continueOnFailure: boolean;
  allocateLog: (target: Target, jobId: number) => string;
  /** Extra environment passed to every invocation. */
  env?: Record<string, string>;
  listener?: SchedulerListener;
  /** Aborting closes admission; running jobs still finish. */
  signal?: AbortSignal;
}

export interface SchedulerResult {
  jobs: Job[];
  skipped: Target[];
  stoppedOnFailure: boolean;
  interrupted: boolean;
}

type Completion =
  | { job: Job; exitCode: number }
  | { job: Job; error: unknown };

/**
 * Bounded worker pool over runner invocations.
 *
 * The loop in {@link JobScheduler.run} is the only writer of the backlog,
 * the running set and the admission flag. Jobs report back exclusively
 * through a completion channel. Every completion already delivered is
 * recorded before the next admission check, so a failure seen in the same
 * wake-up as a success blocks the admission that success would have freed.
 */
export class JobScheduler {
  private readonly options: JobSchedulerOptions;

  constructor(options: JobSchedulerOptions) {
    if (!Number.isInteger(options.maxParallelJobs) || options.maxParallelJobs < 1) {
      throw new Error(
        `maxParallelJobs must be a positive integer (got ${options.maxParallelJobs})`,
      );
    }
    this.options = options;
  }

  async run(targets: Iterable<Target>): Promise<SchedulerResult> {
    const { maxParallelJobs, continueOnFailure, listener, signal } = this.options;

    const backlog = [...targets];
    let cursor = 0;
    const running = new Map<number, Job>();
    const finished: Job[] = [];
    const channel = new CompletionChannel<Completion>();

    let admitting = true;
    let stoppedOnFailure = false;

    const onAbort = () => {
      if (admitting) {
        admitting = false;
        listener?.onAdmissionClosed?.('interrupt');
      }
    };
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      while (cursor < backlog.length || running.size > 0) {
        while (
          admitting &&
          running.size < maxParallelJobs &&
          cursor < backlog.length
        ) {
          const target = backlog[cursor];
          cursor++;
          const job = this.launch(target, cursor, channel);
          running.set(job.id, job);
          await listener?.onJobStarted?.(job);
        }

        if (running.size === 0) break;

        for (const completion of await channel.drain()) {
          const job = completion.job;
          running.delete(job.id);
          job.finishedAt = Date.now();

          if ('error' in completion) {
            job.state = 'failed';
            job.exitCode = null;
            job.error = errorMessage(completion.error);
          } else {
            job.exitCode = completion.exitCode;
            job.state = completion.exitCode === 0 ? 'succeeded' : 'failed';
          }
          finished.push(job);

          if (job.state === 'failed' && !continueOnFailure && admitting) {
            admitting = false;
            stoppedOnFailure = true;
            listener?.onAdmissionClosed?.('failure', job);
          }

          await listener?.onJobFinished?.(job);
        }
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    return {
      jobs: finished,
      skipped: backlog.slice(cursor),
      stoppedOnFailure,
      interrupted: signal?.aborted ?? false,
    };
  }

  private launch(
    target: Target,
    id: number,
    channel: CompletionChannel<Completion>,
  ): Job {
    let logPath = '';
    let allocationError: unknown;
    try {
      logPath = this.options.allocateLog(target, id);
    } catch (error) {
      allocationError = error;
    }

    const job: Job = { id, target, logPath, state: 'pending' };

    if (allocationError !== undefined) {
      job.state = 'running';
      job.startedAt = Date.now();
      channel.push({
        job,
        error: new Error(`Could not allocate log file: ${errorMessage(allocationError)}`),
      });
      return job;
    }

    job.state = 'running';
    job.startedAt = Date.now();

    // Runner errors, synchronous or not, become completions; the chain
    // itself cannot reject.
    void Promise.resolve()
      .then(() =>
        this.options.runner.run({
          target,
          durationSeconds: this.options.perTargetDuration,
          logPath,
          env: { ...this.options.env },
        }),
      )
      .then(
        (outcome) => channel.push({ job, exitCode: outcome.exitCode }),
        (error: unknown) => channel.push({ job, error }),
      );

    return job;
  }
}
