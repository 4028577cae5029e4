import { Option } from 'commander';

/**
 * Shared --json flag for all commands that support JSON output.
 *
 * @example
 * ```typescript
 * program
 *   .command('sources <user>')
 *   .addOption(jsonOption)
 *   .action(...);
 * ```
 */
export const jsonOption = new Option('-j, --json', 'Output as JSON').default(false);
