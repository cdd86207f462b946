#!/usr/bin/env node
/**
 * testrunner - CLI Entry Point
 *
 * Usage:
 *   testrunner [options] [--] <command> [args...]
 */

import { runCli } from './cli-interface';
import { EXIT_INTERNAL } from '../errors/error-codes';

async function main(): Promise<void> {
  // Exit code only; never process.exit() so stderr drains before exit
  process.exitCode = await runCli(process.argv.slice(2));
}

// Run main
main().catch((err: unknown) => {
  console.error(`testrunner: internal error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = EXIT_INTERNAL;
});
