import type { Command } from 'commander';

import type { BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import { openLoggedInSession, resolveConfig } from '@/commands/shared/vaultContext.js';
import { sourcesListMessage } from '@/ui/messages/vault.js';
import { parseSources } from '@/vault/replies.js';

interface SourcesResult {
  userName: string;
  sources: string[];
}

/**
 * Register sources command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerSourcesCommand(program: Command): void {
  program
    .command('sources')
    .description('List the sources that have a stored password')
    .argument('<user>', 'User name')
    .addOption(jsonOption)
    .action(async (userName: string, options: BaseCommandOptions, command: Command) => {
      await runCommand<BaseCommandOptions, SourcesResult>(
        async () => {
          const session = await openLoggedInSession(resolveConfig(command), userName);
          const sources = parseSources(await session.getSources());
          session.logout();
          return { success: true, data: { userName, sources } };
        },
        options,
        (data) => sourcesListMessage(data.userName, data.sources)
      );
    });
}
