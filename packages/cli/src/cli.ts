#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   schemashift --config ./schemashift.json
 */

import { runCli } from './run.js';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`${String(error)}\n`);
    process.exitCode = 1;
  }
);
