import * as fs from 'fs';
import * as os from 'os';

export const DEFAULT_CORE_COUNT = 4;

export interface CoreCountSources {
  liveCount?: () => number;
  readTopology?: () => string;
}

const defaultSources: Required<CoreCountSources> = {
  liveCount: () =>
    typeof os.availableParallelism === 'function'
      ? os.availableParallelism()
      : os.cpus().length,
  readTopology: () => fs.readFileSync('/proc/cpuinfo', 'utf-8'),
};

/**
 * Parallelism hint for the scheduler. Tries the live OS count, then the
 * processor entries of /proc/cpuinfo, then falls back to 4. Never throws.
 */
export function detectCoreCount(sources: CoreCountSources = {}): number {
  const liveCount = sources.liveCount ?? defaultSources.liveCount;
  const readTopology = sources.readTopology ?? defaultSources.readTopology;

  try {
    const count = liveCount();
    if (isPositiveInteger(count)) return count;
  } catch {
    // fall through to the topology file
  }

  try {
    const count = countProcessors(readTopology());
    if (isPositiveInteger(count)) return count;
  } catch {
    // fall through to the default
  }

  return DEFAULT_CORE_COUNT;
}

export function countProcessors(cpuinfo: string): number {
  return cpuinfo.match(/^processor\s*:/gm)?.length ?? 0;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 1;
}
