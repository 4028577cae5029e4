import { Command, Option } from 'commander';

import { commandRegistry } from '@/commandRegistry.js';
import { VERSION } from '@/utils/version.js';

// Commander Configuration
const CLI_NAME = 'pwvault';
const CLI_DESCRIPTION = 'Client for the password vault server';

/**
 * Build the commander program with global connection flags and every command.
 *
 * Global flags override config.json and the PWVAULT_* environment variables.
 */
export function createProgram(): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(VERSION)
    .option('--host <host>', 'Vault server host')
    .option('--port <port>', 'Vault server port')
    .addOption(new Option('--tls', 'Connect over TLS'))
    .addOption(new Option('--no-tls', 'Connect without TLS'))
    .option('--timeout <ms>', 'Idle timeout for connecting and reading, in milliseconds')
    .option('--keys-dir <dir>', 'Directory holding public.der and private.der')
    .option('--debug', 'Enable debug logging (verbose output)');

  commandRegistry.forEach((register) => register(program));
  return program;
}
