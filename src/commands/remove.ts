import type { Command } from 'commander';

import type { BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import { openLoggedInSession, resolveConfig } from '@/commands/shared/vaultContext.js';
import { passwordRemovedMessage, vaultRejectedError } from '@/ui/messages/vault.js';
import { interpretReply } from '@/vault/replies.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

interface SourceResult {
  source: string;
}

/**
 * Register remove command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerRemoveCommand(program: Command): void {
  program
    .command('remove')
    .description('Delete the stored password for a source')
    .argument('<user>', 'User name')
    .argument('<source>', 'Source the password belongs to')
    .addOption(jsonOption)
    .action(
      async (userName: string, source: string, options: BaseCommandOptions, command: Command) => {
        await runCommand<BaseCommandOptions, SourceResult>(
          async () => {
            const session = await openLoggedInSession(resolveConfig(command), userName);
            const reply = interpretReply(await session.deletePassword(source));
            session.logout();
            if (!reply.ok) {
              return {
                success: false,
                error: vaultRejectedError('delete_password', reply.reason),
                exitCode: EXIT_CODES.VAULT_REJECTED,
              };
            }
            return { success: true, data: { source } };
          },
          options,
          (data) => passwordRemovedMessage(data.source)
        );
      }
    );
}
