import * as path from 'path';
import type { RunConfiguration } from './types.js';
import { ConfigError } from './errors.js';

export const DEFAULT_FUZZ_TIME = 10;
export const DEFAULT_CONFIG_DIR = './shared';

export const ENV_VARS = {
  time: 'FUZZ_TIME',
  jobs: 'FUZZ_JOBS',
  errorFile: 'FUZZ_ERROR_FILE',
  continueOnFailure: 'FUZZ_CONTINUE_ON_FAILURE',
  verbose: 'FUZZ_VERBOSE',
  configDir: 'FUZZ_CONFIG_DIR',
  image: 'FUZZ_IMAGE',
} as const;

/** Raw option values as commander hands them over. */
export interface CliOptions {
  time?: string;
  jobs?: string;
  errorFile?: string;
  continue?: boolean;
  verbose?: boolean;
  configDir?: string;
  output?: string;
  dryRun?: boolean;
  keepLogs?: boolean;
  image?: string;
}

export interface ResolveConfigInput {
  root?: string;
  options: CliOptions;
  env: NodeJS.ProcessEnv;
  cwd: string;
  detectCores: () => number;
}

/**
 * Merges defaults, FUZZ_* environment variables and command-line flags
 * (in increasing precedence) into a frozen configuration.
 */
export function resolveConfig(input: ResolveConfigInput): RunConfiguration {
  const { options, env, cwd } = input;

  const perTargetDuration = parsePositiveInteger(
    options.time ?? nonEmpty(env[ENV_VARS.time]),
    options.time !== undefined ? '--time' : ENV_VARS.time,
  );

  const maxParallelJobs =
    parsePositiveInteger(
      options.jobs ?? nonEmpty(env[ENV_VARS.jobs]),
      options.jobs !== undefined ? '--jobs' : ENV_VARS.jobs,
    ) ?? Math.max(1, input.detectCores());

  const continueOnFailure =
    options.continue === true ||
    parseBoolean(env[ENV_VARS.continueOnFailure], ENV_VARS.continueOnFailure);

  const verbose =
    options.verbose === true ||
    parseBoolean(env[ENV_VARS.verbose], ENV_VARS.verbose);

  const errorFile = options.errorFile ?? nonEmpty(env[ENV_VARS.errorFile]);
  const image = options.image ?? nonEmpty(env[ENV_VARS.image]);

  const config: RunConfiguration = {
    root: path.resolve(cwd, input.root ?? '.'),
    perTargetDuration: perTargetDuration ?? DEFAULT_FUZZ_TIME,
    maxParallelJobs,
    continueOnFailure,
    errorLogPath: errorFile !== undefined ? path.resolve(cwd, errorFile) : undefined,
    verbose,
    configDir:
      options.configDir ?? nonEmpty(env[ENV_VARS.configDir]) ?? DEFAULT_CONFIG_DIR,
    outputFile:
      options.output !== undefined ? path.resolve(cwd, options.output) : undefined,
    dryRun: options.dryRun === true,
    keepLogs: options.keepLogs === true,
    image,
  };

  return Object.freeze(config);
}

export function parsePositiveInteger(
  value: string | undefined,
  source: string,
): number | undefined {
  if (value === undefined) return undefined;

  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError(
      `Invalid value for ${source}: "${value}". Must be a positive integer`,
    );
  }

  const parsed = Number(trimmed);
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new ConfigError(
      `Invalid value for ${source}: "${value}". Must be a positive integer`,
    );
  }

  return parsed;
}

const TRUE_VALUES = ['true', '1', 'yes'];
const FALSE_VALUES = ['false', '0', 'no', ''];

export function parseBoolean(value: string | undefined, source: string): boolean {
  if (value === undefined) return false;

  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;

  throw new ConfigError(
    `Invalid value for ${source}: "${value}". Must be one of true, false, 1, 0, yes, no`,
  );
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/** Per-job GOMAXPROCS so concurrent fuzzers share the machine evenly. */
export function cpuSharePerJob(cores: number, jobs: number): number {
  return Math.max(1, Math.floor(cores / Math.max(1, jobs)));
}
