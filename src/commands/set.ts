import type { Command } from 'commander';

import type { BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import { openLoggedInSession, resolveConfig } from '@/commands/shared/vaultContext.js';
import { passwordStoredMessage, vaultRejectedError } from '@/ui/messages/vault.js';
import { interpretReply } from '@/vault/replies.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

interface SourceResult {
  source: string;
}

/**
 * Register set command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerSetCommand(program: Command): void {
  program
    .command('set')
    .description('Store the password for a source')
    .argument('<user>', 'User name')
    .argument('<source>', 'Source the password belongs to')
    .argument('<password>', 'Password to store')
    .addOption(jsonOption)
    .action(
      async (
        userName: string,
        source: string,
        password: string,
        options: BaseCommandOptions,
        command: Command
      ) => {
        await runCommand<BaseCommandOptions, SourceResult>(
          async () => {
            const session = await openLoggedInSession(resolveConfig(command), userName);
            const reply = interpretReply(await session.setPassword(source, password));
            session.logout();
            if (!reply.ok) {
              return {
                success: false,
                error: vaultRejectedError('set_password', reply.reason),
                exitCode: EXIT_CODES.VAULT_REJECTED,
              };
            }
            return { success: true, data: { source } };
          },
          options,
          (data) => passwordStoredMessage(data.source)
        );
      }
    );
}
