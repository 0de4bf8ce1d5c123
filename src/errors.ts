export const EXIT_CODES = {
  success: 0,
  failure: 1,
  config: 2,
  scan: 3,
  interrupted: 130,
} as const;

/** Invalid flag or environment value; raised before scanning starts. */
export class ConfigError extends Error {
  readonly exitCode = EXIT_CODES.config;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Scan root is missing, not a directory, or unreadable. */
export class ScanError extends Error {
  readonly exitCode = EXIT_CODES.scan;

  constructor(
    message: string,
    readonly root: string,
  ) {
    super(message);
    this.name = 'ScanError';
  }
}

/** A single target's runner could not be started. */
export class LaunchError extends Error {
  constructor(
    message: string,
    readonly command: string,
  ) {
    super(message);
    this.name = 'LaunchError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
