#!/usr/bin/env node
/**
 * CLI entry point for mcapi.
 * Delegates to runCli and exits with its status code.
 */

import { runCli } from './cli/run.js';

const code = await runCli(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
});
process.exitCode = code;
