#!/usr/bin/env node
/**
 * Executable entry point.
 *
 * @module cli
 */

import { run_cli } from './cli/run';

run_cli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('[CLI] fatal:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
);
