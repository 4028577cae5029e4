import type { Command } from 'commander';

import type { BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import { openLoggedInSession, resolveConfig } from '@/commands/shared/vaultContext.js';
import { noPasswordError } from '@/ui/messages/vault.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

interface GetResult {
  source: string;
  password: string;
}

/**
 * Register get command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerGetCommand(program: Command): void {
  program
    .command('get')
    .description('Print the decrypted password for a source')
    .argument('<user>', 'User name')
    .argument('<source>', 'Source the password belongs to')
    .addOption(jsonOption)
    .action(
      async (userName: string, source: string, options: BaseCommandOptions, command: Command) => {
        await runCommand<BaseCommandOptions, GetResult>(
          async () => {
            const session = await openLoggedInSession(resolveConfig(command), userName);
            const response = await session.getPassword(source);
            session.logout();
            // No body: nothing stored under this source
            if (response.body.length === 0) {
              return {
                success: false,
                error: noPasswordError(source),
                suggestion: `List stored sources with: pwvault sources ${userName}`,
                exitCode: EXIT_CODES.RESOURCE_NOT_FOUND,
              };
            }
            return {
              success: true,
              data: { source, password: session.decryptPassword(response.body) },
            };
          },
          options,
          (data) => data.password
        );
      }
    );
}
