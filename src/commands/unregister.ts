import type { Command } from 'commander';

import type { BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import { openLoggedInSession, resolveConfig } from '@/commands/shared/vaultContext.js';
import { userRemovedMessage, vaultRejectedError } from '@/ui/messages/vault.js';
import { interpretReply } from '@/vault/replies.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

interface UserResult {
  userName: string;
}

/**
 * Register unregister command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerUnregisterCommand(program: Command): void {
  program
    .command('unregister')
    .description('Delete the vault account and every password stored under it')
    .argument('<user>', 'User name')
    .addOption(jsonOption)
    .action(async (userName: string, options: BaseCommandOptions, command: Command) => {
      await runCommand<BaseCommandOptions, UserResult>(
        async () => {
          const session = await openLoggedInSession(resolveConfig(command), userName);
          const reply = interpretReply(await session.deleteUser());
          if (!reply.ok) {
            return {
              success: false,
              error: vaultRejectedError('delete_user', reply.reason),
              exitCode: EXIT_CODES.VAULT_REJECTED,
            };
          }
          return { success: true, data: { userName } };
        },
        options,
        (data) => userRemovedMessage(data.userName)
      );
    });
}
