#!/usr/bin/env node

import { createProgram } from '@/program.js';
import { createLogger, enableDebugLogging } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

const log = createLogger('pwvault');

/**
 * Main entry point.
 *
 * Process flow:
 * 1. Enable debug logging early when --debug is present
 * 2. Build the program (global connection flags and command handlers)
 * 3. Route to the requested command
 */
async function main(): Promise<void> {
  if (process.argv.includes('--debug')) {
    enableDebugLogging();
  }

  await createProgram().parseAsync();
}

main().catch((error: unknown) => {
  log.info(getErrorMessage(error));
  process.exit(EXIT_CODES.SOFTWARE_ERROR);
});
