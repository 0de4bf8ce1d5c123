import * as fs from 'fs';
import * as path from 'path';
import type { Target } from '../types.js';
import { ScanError, errorMessage } from '../errors.js';

export interface ScanConvention {
  /** Matched against file base names. */
  testFilePattern: RegExp;
  /** Must capture the entry point name in group 1. */
  entryPointPattern: RegExp;
}

export const GO_FUZZ_CONVENTION: ScanConvention = {
  testFilePattern: /_test\.go$/,
  entryPointPattern: /\bfunc\s+(Fuzz\w*)\s*\(/g,
};

const SKIPPED_DIRECTORIES = new Set(['vendor', 'node_modules']);

export interface EntryPointScanner {
  scan(root: string): Iterable<Target>;
}

export interface PatternScannerOptions {
  convention?: ScanConvention;
  onWarning?: (message: string) => void;
}

/**
 * Finds fuzz entry points by matching source text. Traversal follows
 * directory listing order, so the order of yielded targets may differ
 * between file systems; use {@link sortTargets} for stable display.
 */
export class PatternScanner implements EntryPointScanner {
  private readonly convention: ScanConvention;
  private readonly onWarning: (message: string) => void;

  constructor(options: PatternScannerOptions = {}) {
    this.convention = options.convention ?? GO_FUZZ_CONVENTION;
    this.onWarning = options.onWarning ?? (() => {});
  }

  scan(root: string): Iterable<Target> {
    const rootPath = path.resolve(root);
    assertReadableDirectory(rootPath);
    return this.walk(rootPath, rootPath);
  }

  private *walk(rootPath: string, dir: string): Generator<Target> {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (error) {
      this.onWarning(`Could not read directory ${dir}: ${errorMessage(error)}`);
      return;
    }

    const seen = new Set<string>();

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        if (entry.name.startsWith('.') || SKIPPED_DIRECTORIES.has(entry.name)) {
          continue;
        }
        yield* this.walk(rootPath, fullPath);
        continue;
      }

      if (!entry.isFile() || !this.convention.testFilePattern.test(entry.name)) {
        continue;
      }

      let content: string;
      try {
        content = fs.readFileSync(fullPath, 'utf-8');
      } catch (error) {
        this.onWarning(`Could not read ${fullPath}: ${errorMessage(error)}`);
        continue;
      }

      const modulePath = toPosix(path.relative(rootPath, dir)) || '.';
      const sourceFile = toPosix(path.relative(rootPath, fullPath));

      for (const name of extractEntryPoints(content, this.convention)) {
        // Names are unique per directory; first file wins.
        if (seen.has(name)) continue;
        seen.add(name);
        yield Object.freeze({ modulePath, entryPointName: name, sourceFile });
      }
    }
  }
}

export function extractEntryPoints(
  content: string,
  convention: ScanConvention = GO_FUZZ_CONVENTION,
): string[] {
  const flags = convention.entryPointPattern.flags.includes('g')
    ? convention.entryPointPattern.flags
    : `${convention.entryPointPattern.flags}g`;
  const pattern = new RegExp(convention.entryPointPattern.source, flags);

  const names: string[] = [];
  for (const match of content.matchAll(pattern)) {
    const name = match[1];
    if (name && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

export function discoverTargets(
  root: string,
  options: PatternScannerOptions = {},
): Target[] {
  return [...new PatternScanner(options).scan(root)];
}

export function sortTargets(targets: readonly Target[]): Target[] {
  return [...targets].sort(
    (a, b) =>
      compare(a.modulePath, b.modulePath) ||
      compare(a.entryPointName, b.entryPointName),
  );
}

function compare(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function assertReadableDirectory(rootPath: string): void {
  if (!fs.existsSync(rootPath)) {
    throw new ScanError(`Directory does not exist: ${rootPath}`, rootPath);
  }

  const stat = fs.statSync(rootPath);
  if (!stat.isDirectory()) {
    throw new ScanError(`Path is not a directory: ${rootPath}`, rootPath);
  }

  try {
    fs.accessSync(rootPath, fs.constants.R_OK | fs.constants.X_OK);
  } catch {
    throw new ScanError(`Directory is not readable: ${rootPath}`, rootPath);
  }
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}
