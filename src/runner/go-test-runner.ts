import { spawn, type ChildProcess } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import type {
  RunnerInvocation,
  RunnerOutcome,
  Target,
  TestRunner,
} from '../types.js';
import { LaunchError, errorMessage } from '../errors.js';

export function buildGoTestArgs(target: Target, durationSeconds: number): string[] {
  const packageArg =
    target.modulePath === '.' ? '.' : `./${target.modulePath}`;
  const anchored = `^${target.entryPointName}$`;

  return [
    'test',
    packageArg,
    `-run=${anchored}`,
    `-fuzz=${anchored}`,
    `-fuzztime=${durationSeconds}s`,
  ];
}

export interface GoTestRunnerOptions {
  /** Module root; every invocation runs from here. */
  cwd: string;
  /** Executable plus leading arguments, `['go']` by default. */
  command?: string[];
  baseEnv?: NodeJS.ProcessEnv;
}

/**
 * Runs `go test -fuzz` for one target as a child process, writing combined
 * stdout and stderr to the invocation's log file.
 */
export class GoTestRunner implements TestRunner {
  private readonly cwd: string;
  private readonly command: string[];
  private readonly baseEnv: NodeJS.ProcessEnv;

  constructor(options: GoTestRunnerOptions) {
    this.cwd = options.cwd;
    this.command = options.command ?? ['go'];
    this.baseEnv = options.baseEnv ?? process.env;
  }

  run(invocation: RunnerInvocation): Promise<RunnerOutcome> {
    const [executable = 'go', ...leadingArgs] = this.command;
    const args = [
      ...leadingArgs,
      ...buildGoTestArgs(invocation.target, invocation.durationSeconds),
    ];

    return new Promise((resolve, reject) => {
      const log = fs.createWriteStream(invocation.logPath, { flags: 'a' });
      let logError: Error | null = null;
      log.on('error', (error) => {
        logError = error;
      });

      let child: ChildProcess;
      try {
        child = spawn(executable, args, {
          cwd: this.cwd,
          env: { ...this.baseEnv, ...invocation.env },
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        log.end(() =>
          reject(
            new LaunchError(
              `Could not launch ${executable}: ${errorMessage(error)}`,
              executable,
            ),
          ),
        );
        return;
      }

      let spawned = false;
      let launchFailed = false;

      child.stdout?.pipe(log, { end: false });
      child.stderr?.pipe(log, { end: false });

      child.on('spawn', () => {
        spawned = true;
      });

      child.on('error', (error) => {
        // Errors after a successful spawn are followed by 'close'.
        if (spawned) return;
        launchFailed = true;
        log.end(() =>
          reject(
            new LaunchError(
              `Could not launch ${executable}: ${error.message}`,
              executable,
            ),
          ),
        );
      });

      child.on('close', (code, signal) => {
        if (launchFailed) return;
        log.end(() => {
          if (logError) {
            reject(
              new Error(
                `Could not write log ${invocation.logPath}: ${logError.message}`,
              ),
            );
            return;
          }
          resolve({ exitCode: code ?? signalExitCode(signal) });
        });
      });
    });
  }
}

function signalExitCode(signal: NodeJS.Signals | null): number {
  if (signal === null) return 1;
  return 128 + (os.constants.signals[signal] ?? 0);
}
