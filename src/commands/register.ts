import type { Command } from 'commander';

import type { BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import { openSession, resolveConfig } from '@/commands/shared/vaultContext.js';
import { userRegisteredMessage, vaultRejectedError } from '@/ui/messages/vault.js';
import { interpretReply } from '@/vault/replies.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

interface UserResult {
  userName: string;
}

/**
 * Register register command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerRegisterCommand(program: Command): void {
  program
    .command('register')
    .description('Create a vault account bound to the stored public key')
    .argument('<user>', 'User name')
    .addOption(jsonOption)
    .action(async (userName: string, options: BaseCommandOptions, command: Command) => {
      await runCommand<BaseCommandOptions, UserResult>(
        async () => {
          const session = await openSession(resolveConfig(command));
          const reply = interpretReply(await session.createUser(userName));
          if (!reply.ok) {
            return {
              success: false,
              error: vaultRejectedError('create_user', reply.reason),
              exitCode: EXIT_CODES.VAULT_REJECTED,
            };
          }
          return { success: true, data: { userName } };
        },
        options,
        (data) => userRegisteredMessage(data.userName)
      );
    });
}
