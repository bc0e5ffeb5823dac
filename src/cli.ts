#!/usr/bin/env node
/**
 * misis-id CLI entry point
 *
 * Usage:
 *   npx tsx src/cli.ts --login <login> --password <password> [--format json] [--verbose]
 */

import { loadEnv } from './shared/config.js';
import { runCli } from './cli/run.js';

loadEnv();

runCli(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`Failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  });
