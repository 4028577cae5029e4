import * as fs from 'fs';

import type { Command } from 'commander';

import { keyPaths } from '@/config/config.js';
import type { BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import { resolveConfig } from '@/commands/shared/vaultContext.js';
import { CommandError } from '@/ui/errors/index.js';
import { keysExistError, keysWrittenMessage } from '@/ui/messages/vault.js';
import { RsaKeyPair } from '@/vault/keys.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

interface KeygenOptions extends BaseCommandOptions {
  /** Overwrite an existing key pair */
  force?: boolean;
}

interface KeygenResult {
  publicKeyPath: string;
  privateKeyPath: string;
  modulusBits: number;
}

/**
 * Register keygen command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerKeygenCommand(program: Command): void {
  program
    .command('keygen')
    .description('Generate the RSA key pair used to log in and encrypt passwords')
    .option('-f, --force', 'Overwrite an existing key pair', false)
    .addOption(jsonOption)
    .action(async (options: KeygenOptions, command: Command) => {
      await runCommand<KeygenOptions, KeygenResult>(
        async (opts) => {
          const { publicKeyPath, privateKeyPath } = keyPaths(resolveConfig(command));
          if (!opts.force && fs.existsSync(privateKeyPath)) {
            throw new CommandError(
              keysExistError(privateKeyPath),
              { suggestion: 'Overwrite them with: pwvault keygen --force' },
              EXIT_CODES.RESOURCE_ALREADY_EXISTS
            );
          }

          const keys = RsaKeyPair.generate();
          await keys.save(publicKeyPath, privateKeyPath);
          return {
            success: true,
            data: { publicKeyPath, privateKeyPath, modulusBits: keys.modulusBits },
          };
        },
        options,
        (data) => keysWrittenMessage(data.publicKeyPath, data.privateKeyPath)
      );
    });
}
