#!/usr/bin/env node

/**
 * protostub CLI entry point.
 *
 * This is the main entry point for the 'protostub' CLI command.
 */

import { runCli } from './cli.js';
import { withErrorHandling } from './utils/errorHandling.js';

/**
 * Main CLI entry point.
 */
function main(): void {
  withErrorHandling(async () => ({ exitCode: await runCli(process.argv.slice(2)) }));
}

main();
