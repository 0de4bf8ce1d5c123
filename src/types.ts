export interface Target {
  readonly modulePath: string;
  readonly entryPointName: string;
  readonly sourceFile: string;
}

export type JobState = 'pending' | 'running' | 'succeeded' | 'failed';

export type JobOutcome = Extract<JobState, 'succeeded' | 'failed'>;

export interface Job {
  readonly id: number;
  readonly target: Target;
  readonly logPath: string;
  state: JobState;
  startedAt?: number;
  finishedAt?: number;
  // null when the runner could not be launched
  exitCode?: number | null;
  error?: string;
}

export interface RunConfiguration {
  readonly root: string;
  readonly perTargetDuration: number;
  readonly maxParallelJobs: number;
  readonly continueOnFailure: boolean;
  readonly errorLogPath?: string;
  readonly verbose: boolean;
  /**
   * Passed to every run as FUZZ_CONFIG_DIR. A relative path stays relative
   * and is read from the scan root, where `go test` runs (locally or in the
   * container's /workspace).
   */
  readonly configDir: string;
  readonly outputFile?: string;
  readonly dryRun: boolean;
  readonly keepLogs: boolean;
  readonly image?: string;
}

export interface RunSummary {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  interrupted: boolean;
  durationMs: number;
}

export interface JobRecord {
  modulePath: string;
  entryPointName: string;
  sourceFile: string;
  status: JobOutcome;
  exitCode: number | null;
  durationMs: number;
  error?: string;
}

export interface RunReport {
  summary: RunSummary;
  results: JobRecord[];
}

export interface RunnerInvocation {
  target: Target;
  durationSeconds: number;
  logPath: string;
  env: Record<string, string>;
}

export interface RunnerOutcome {
  exitCode: number;
}

/**
 * Runs a single fuzz entry point for a bounded duration. Implementations
 * write combined stdout/stderr to `logPath` and reject with a
 * {@link LaunchError} when the invocation cannot be started at all.
 */
export interface TestRunner {
  /** One-time setup before the first invocation; a rejection aborts the run. */
  prepare?(): Promise<void>;
  run(invocation: RunnerInvocation): Promise<RunnerOutcome>;
}

/** Minimal writable surface used for interactive output. */
export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}
