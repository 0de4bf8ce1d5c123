import * as fs from 'fs';
import type { RunReport, RunSummary } from '../types.js';
import { EXIT_CODES } from '../errors.js';

export function emptySummary(total = 0): RunSummary {
  return {
    total,
    succeeded: 0,
    failed: 0,
    skipped: total,
    interrupted: false,
    durationMs: 0,
  };
}

export function isSuccessful(summary: RunSummary): boolean {
  return summary.failed === 0;
}

export function exitCodeFor(summary: RunSummary): number {
  if (summary.interrupted) return EXIT_CODES.interrupted;
  return isSuccessful(summary) ? EXIT_CODES.success : EXIT_CODES.failure;
}

export function writeReport(outputPath: string, report: RunReport): void {
  fs.writeFileSync(outputPath, JSON.stringify(report, null, 2));
}
