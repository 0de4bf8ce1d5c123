#!/usr/bin/env node

import { runCli } from './cli.js';

const controller = new AbortController();

// First Ctrl-C stops new targets from starting; a second one kills the process.
process.once('SIGINT', () => {
  controller.abort();
});

runCli(process.argv.slice(2), {
  env: process.env,
  cwd: process.cwd(),
  stdout: process.stdout,
  stderr: process.stderr,
  signal: controller.signal,
}).then(
  (exitCode) => {
    process.exit(exitCode);
  },
  (error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  },
);
