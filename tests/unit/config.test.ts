import { describe, it, expect } from 'vitest';
import * as path from 'path';
import {
  DEFAULT_CONFIG_DIR,
  DEFAULT_FUZZ_TIME,
  cpuSharePerJob,
  parseBoolean,
  parsePositiveInteger,
  resolveConfig,
  type CliOptions,
} from '../../src/config.js';
import { ConfigError } from '../../src/errors.js';

const cwd = path.resolve('/work/project');

function resolve(options: CliOptions = {}, env: NodeJS.ProcessEnv = {}, root?: string) {
  return resolveConfig({ root, options, env, cwd, detectCores: () => 6 });
}

describe('resolveConfig', () => {
  it('applies defaults', () => {
    const config = resolve();

    expect(config).toEqual({
      root: cwd,
      perTargetDuration: DEFAULT_FUZZ_TIME,
      maxParallelJobs: 6,
      continueOnFailure: false,
      errorLogPath: undefined,
      verbose: false,
      configDir: DEFAULT_CONFIG_DIR,
      outputFile: undefined,
      dryRun: false,
      keepLogs: false,
      image: undefined,
    });
  });

  it('returns a frozen configuration', () => {
    expect(Object.isFrozen(resolve())).toBe(true);
  });

  it('reads FUZZ_* environment variables', () => {
    const config = resolve(
      {},
      {
        FUZZ_TIME: '30',
        FUZZ_JOBS: '2',
        FUZZ_ERROR_FILE: 'errors.log',
        FUZZ_CONTINUE_ON_FAILURE: 'TRUE',
        FUZZ_VERBOSE: '1',
        FUZZ_CONFIG_DIR: '/etc/fuzz',
        FUZZ_IMAGE: 'golang:1.22',
      },
    );

    expect(config.perTargetDuration).toBe(30);
    expect(config.maxParallelJobs).toBe(2);
    expect(config.errorLogPath).toBe(path.join(cwd, 'errors.log'));
    expect(config.continueOnFailure).toBe(true);
    expect(config.verbose).toBe(true);
    expect(config.configDir).toBe('/etc/fuzz');
    expect(config.image).toBe('golang:1.22');
  });

  it('lets flags override the environment', () => {
    const config = resolve(
      { time: '5', jobs: '3', errorFile: 'flag.log' },
      { FUZZ_TIME: '30', FUZZ_JOBS: '2', FUZZ_ERROR_FILE: 'env.log' },
    );

    expect(config.perTargetDuration).toBe(5);
    expect(config.maxParallelJobs).toBe(3);
    expect(config.errorLogPath).toBe(path.join(cwd, 'flag.log'));
  });

  it('treats empty environment values as unset', () => {
    const config = resolve({}, { FUZZ_TIME: '', FUZZ_JOBS: '  ' });

    expect(config.perTargetDuration).toBe(DEFAULT_FUZZ_TIME);
    expect(config.maxParallelJobs).toBe(6);
  });

  it('resolves the root against the working directory', () => {
    expect(resolve({}, {}, 'src').root).toBe(path.join(cwd, 'src'));
  });

  it('rejects zero jobs with a ConfigError', () => {
    expect(() => resolve({ jobs: '0' })).toThrow(ConfigError);
    expect(() => resolve({ jobs: '0' })).toThrow(
      'Invalid value for --jobs: "0". Must be a positive integer',
    );
  });

  it('names the environment variable in errors', () => {
    expect(() => resolve({}, { FUZZ_JOBS: 'many' })).toThrow(
      'Invalid value for FUZZ_JOBS: "many". Must be a positive integer',
    );
  });

  it('rejects a non-numeric time', () => {
    expect(() => resolve({ time: '1.5' })).toThrow(ConfigError);
  });

  it('keeps a relative config dir relative to the scan root', () => {
    const config = resolve({ configDir: './conf' }, {}, 'services/api');

    expect(config.root).toBe(path.join(cwd, 'services/api'));
    expect(config.configDir).toBe('./conf');
  });

  it('rejects an unrecognised boolean value', () => {
    expect(() => resolve({}, { FUZZ_VERBOSE: 'maybe' })).toThrow(ConfigError);
  });
});

describe('parsePositiveInteger', () => {
  it('returns undefined for a missing value', () => {
    expect(parsePositiveInteger(undefined, '--jobs')).toBeUndefined();
  });

  it('trims surrounding whitespace', () => {
    expect(parsePositiveInteger(' 12 ', '--jobs')).toBe(12);
  });

  it('rejects negative numbers', () => {
    expect(() => parsePositiveInteger('-1', '--jobs')).toThrow(ConfigError);
  });
});

describe('parseBoolean', () => {
  it.each([
    ['true', true],
    ['Yes', true],
    ['1', true],
    ['false', false],
    ['NO', false],
    ['0', false],
    ['', false],
  ])('parses %j as %s', (value, expected) => {
    expect(parseBoolean(value, 'FUZZ_VERBOSE')).toBe(expected);
  });

  it('is false when unset', () => {
    expect(parseBoolean(undefined, 'FUZZ_VERBOSE')).toBe(false);
  });
});

describe('cpuSharePerJob', () => {
  it('divides cores between jobs', () => {
    expect(cpuSharePerJob(8, 2)).toBe(4);
    expect(cpuSharePerJob(7, 2)).toBe(3);
  });

  it('never drops below one', () => {
    expect(cpuSharePerJob(2, 8)).toBe(1);
  });
});
