import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { Target } from '../types.js';

/**
 * Temporary directory holding one private log file per job. Paths embed the
 * job id, so two jobs never share a file even for identical targets.
 */
export class LogDirectory {
  readonly dir: string;

  constructor(prefix: string = 'parallel-fuzz-') {
    this.dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  }

  allocate(target: Target, jobId: number): string {
    const logPath = path.join(
      this.dir,
      `${jobId}-${sanitize(target.modulePath)}-${sanitize(target.entryPointName)}.log`,
    );
    fs.writeFileSync(logPath, '', { flag: 'wx' });
    return logPath;
  }

  dispose(): void {
    fs.rmSync(this.dir, { recursive: true, force: true });
  }
}

function sanitize(value: string): string {
  const cleaned = value.replace(/[^A-Za-z0-9_.-]+/g, '_').replace(/^\.+$/, 'root');
  return cleaned || 'root';
}
