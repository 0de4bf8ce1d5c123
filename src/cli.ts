import { Command, CommanderError } from 'commander';
import type {
  OutputStream,
  RunConfiguration,
  RunSummary,
  Target,
  TestRunner,
} from './types.js';
import { type CliOptions, cpuSharePerJob, resolveConfig } from './config.js';
import {
  ConfigError,
  EXIT_CODES,
  LaunchError,
  ScanError,
  errorMessage,
} from './errors.js';
import { ContainerManager } from './docker/container.js';
import { ContainerTestRunner } from './runner/container-runner.js';
import { GoTestRunner } from './runner/go-test-runner.js';
import { LogDirectory } from './runner/log-directory.js';
import { ResultAggregator } from './runner/result-aggregator.js';
import { JobScheduler } from './runner/scheduler.js';
import { detectCoreCount } from './utils/cpu.js';
import { ErrorSink } from './utils/error-sink.js';
import { Logger, formatDuration } from './utils/logger.js';
import { emptySummary, exitCodeFor, writeReport } from './utils/report.js';
import { discoverTargets, sortTargets } from './utils/test-discovery.js';

export const VERSION = '1.0.0';

export interface RunnerContext {
  cpusPerJob: number;
}

export interface CliDependencies {
  env: NodeJS.ProcessEnv;
  cwd: string;
  stdout: OutputStream;
  stderr: OutputStream;
  detectCores?: () => number;
  createRunner?: (config: RunConfiguration, context: RunnerContext) => TestRunner;
  signal?: AbortSignal;
}

export function createDefaultRunner(
  config: RunConfiguration,
  context: RunnerContext,
): TestRunner {
  if (config.image) {
    return new ContainerTestRunner({
      executor: new ContainerManager(),
      image: config.image,
      hostRoot: config.root,
      cpusPerJob: context.cpusPerJob,
    });
  }
  return new GoTestRunner({ cwd: config.root });
}

/** Parses `argv` (without node and script), runs, and returns the exit code. */
export async function runCli(
  argv: string[],
  deps: CliDependencies,
): Promise<number> {
  let exitCode: number = EXIT_CODES.success;

  const program = new Command();
  program
    .name('fuzz')
    .description(
      'Discover Go fuzz targets and run them on a bounded pool of parallel jobs',
    )
    .version(VERSION)
    .argument('[root]', 'Root of the source tree to scan', '.')
    .option(
      '-t, --time <seconds>',
      'Fuzz time per target in seconds (default: 10, env FUZZ_TIME)',
    )
    .option(
      '-j, --jobs <n>',
      'Number of parallel fuzz targets (default: detected CPU cores, env FUZZ_JOBS)',
    )
    .option(
      '-e, --error-file <file>',
      'Append failure output to file as well as stderr (env FUZZ_ERROR_FILE)',
    )
    .option(
      '-c, --continue',
      'Keep starting targets after a failure (env FUZZ_CONTINUE_ON_FAILURE)',
    )
    .option('-v, --verbose', 'Report every target start and finish (env FUZZ_VERBOSE)')
    .option(
      '--config-dir <dir>',
      'Shared configuration directory passed to each run, relative to root (env FUZZ_CONFIG_DIR)',
    )
    .option('-o, --output <file>', 'Write a JSON report to file')
    .option('--dry-run', 'List discovered targets without running them')
    .option('--keep-logs', 'Keep per-target log files after the run')
    .option(
      '--image <image>',
      'Run each target inside this Docker image (env FUZZ_IMAGE)',
    )
    .exitOverride()
    .configureOutput({
      writeOut: (str) => deps.stdout.write(str),
      writeErr: (str) => deps.stderr.write(str),
    })
    .action(async (root: string, options: CliOptions) => {
      exitCode = await execute(root, options, deps);
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and version exit with 0; parse errors are configuration errors
      return error.exitCode === 0 ? EXIT_CODES.success : EXIT_CODES.config;
    }
    throw error;
  }

  return exitCode;
}

async function execute(
  root: string,
  options: CliOptions,
  deps: CliDependencies,
): Promise<number> {
  const detectCores = deps.detectCores ?? (() => detectCoreCount());

  let config: RunConfiguration;
  try {
    config = resolveConfig({
      root,
      options,
      env: deps.env,
      cwd: deps.cwd,
      detectCores,
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      new Logger(deps).error(error.message);
      return error.exitCode;
    }
    throw error;
  }

  const logger = new Logger({ ...deps, verbose: config.verbose });

  let targets: Target[];
  try {
    targets = discoverTargets(config.root, { onWarning: (m) => logger.warn(m) });
  } catch (error) {
    if (error instanceof ScanError) {
      logger.error(error.message);
      return error.exitCode;
    }
    throw error;
  }

  logger.info(`\nparallel-fuzz v${VERSION}`);
  logger.info('================');
  logger.info(`Root: ${config.root}`);
  logger.info(`Targets found: ${targets.length}`);

  if (targets.length === 0) {
    logger.info('\nNo fuzz targets found.');
    if (config.outputFile) {
      writeReport(config.outputFile, { summary: emptySummary(), results: [] });
    }
    return EXIT_CODES.success;
  }

  if (config.dryRun) {
    logger.info('\n[DRY RUN] Would run the following targets:');
    sortTargets(targets).forEach((t, i) => {
      logger.info(`  ${i + 1}. ${t.entryPointName} in ${t.sourceFile}`);
    });
    if (config.outputFile) {
      writeReport(config.outputFile, {
        summary: emptySummary(targets.length),
        results: [],
      });
    }
    return EXIT_CODES.success;
  }

  const cpusPerJob = cpuSharePerJob(detectCores(), config.maxParallelJobs);

  logger.info(
    `Running with ${config.maxParallelJobs} parallel jobs, ${config.perTargetDuration}s per target`,
  );
  logger.debug(`Each target may use up to ${cpusPerJob} CPU cores (GOMAXPROCS)`);
  if (targets.length > 50 && !config.verbose) {
    logger.info('Large number of fuzz targets - this may take a while');
  }

  const errorSink = new ErrorSink({
    stream: deps.stderr,
    errorLogPath: config.errorLogPath,
  });
  const aggregator = new ResultAggregator({
    total: targets.length,
    logger,
    errorSink,
  });
  const createRunner = deps.createRunner ?? createDefaultRunner;
  const runner = createRunner(config, { cpusPerJob });
  try {
    await runner.prepare?.();
  } catch (error) {
    if (error instanceof LaunchError) {
      logger.error(error.message);
      return EXIT_CODES.failure;
    }
    throw error;
  }

  const logs = new LogDirectory();

  const scheduler = new JobScheduler({
    runner,
    maxParallelJobs: config.maxParallelJobs,
    perTargetDuration: config.perTargetDuration,
    continueOnFailure: config.continueOnFailure,
    allocateLog: (target, jobId) => logs.allocate(target, jobId),
    env: {
      GOMAXPROCS: String(cpusPerJob),
      FUZZ_CONFIG_DIR: config.configDir,
    },
    signal: deps.signal,
    listener: {
      onJobStarted: (job) => aggregator.started(job),
      onJobFinished: (job) => aggregator.record(job),
      onAdmissionClosed: (reason) => {
        if (reason === 'failure') {
          logger.warn('Stopping due to failure (use -c to continue on failures)');
        } else {
          logger.warn('Interrupted, waiting for running targets to finish');
        }
      },
    },
  });

  const startTime = Date.now();
  let summary: RunSummary;
  try {
    const result = await scheduler.run(targets);
    summary = aggregator.summarize({
      skipped: result.skipped.length,
      interrupted: result.interrupted,
      durationMs: Date.now() - startTime,
    });
    if (summary.failed > 0) {
      try {
        await errorSink.write(`Total of ${summary.failed} fuzz tests failed`);
      } catch (error) {
        logger.warn(`Could not append to error file: ${errorMessage(error)}`);
      }
    }
    await errorSink.flush();
  } finally {
    if (config.keepLogs) {
      logger.info(`Logs kept in: ${logs.dir}`);
    } else {
      logs.dispose();
    }
  }

  printSummary(logger, summary);

  if (summary.failed > 0 && config.errorLogPath) {
    logger.info(`Errors have been logged to: ${config.errorLogPath}`);
  }

  if (config.outputFile) {
    writeReport(config.outputFile, { summary, results: aggregator.results });
    logger.info(`\nReport written to: ${config.outputFile}`);
  }

  return exitCodeFor(summary);
}

function printSummary(logger: Logger, summary: RunSummary): void {
  logger.info('\n================');
  logger.info('Summary');
  logger.info('================');
  logger.info(`Total:   ${summary.total}`);
  logger.info(`Passed:  ${summary.succeeded}`, 'green');
  logger.info(`Failed:  ${summary.failed}`, summary.failed > 0 ? 'red' : undefined);
  logger.info(`Skipped: ${summary.skipped}`);
  logger.info(`Time:    ${formatDuration(summary.durationMs)}`);
}
