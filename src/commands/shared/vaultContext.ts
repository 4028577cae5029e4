/**
 * Shared setup for the vault commands: configuration, keys, client and login.
 */

import * as fs from 'fs';

import type { Command } from 'commander';

import { ProtocolClient } from '@/client/ProtocolClient.js';
import { keyPaths, loadConfig, toClientOptions } from '@/config/config.js';
import type { ConfigOverrides, VaultConfig } from '@/config/config.js';
import { CommandError } from '@/ui/errors/index.js';
import { loginRefusedError } from '@/ui/messages/vault.js';
import { AuthenticatedSession } from '@/vault/AuthenticatedSession.js';
import { RsaKeyPair } from '@/vault/keys.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Global flags, declared once on the program.
 */
export interface GlobalOptions {
  host?: string;
  port?: string;
  tls?: boolean;
  timeout?: string;
  keysDir?: string;
  debug?: boolean;
}

/**
 * Translate global flags into config overrides; unset flags leave lower layers alone.
 */
export function overridesFromFlags(flags: GlobalOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (flags.host !== undefined) overrides.host = flags.host;
  if (flags.port !== undefined) overrides.port = Number(flags.port);
  if (flags.tls !== undefined) overrides.tls = flags.tls;
  if (flags.timeout !== undefined) overrides.timeoutMs = Number(flags.timeout);
  if (flags.keysDir !== undefined) overrides.keysDir = flags.keysDir;
  return overrides;
}

/**
 * Resolve the configuration for the command being run.
 */
export function resolveConfig(command: Command): VaultConfig {
  return loadConfig({ overrides: overridesFromFlags(command.optsWithGlobals<GlobalOptions>()) });
}

/**
 * Load the stored key pair.
 *
 * @throws CommandError when no private key file exists yet
 */
export async function loadKeys(config: VaultConfig): Promise<RsaKeyPair> {
  const { publicKeyPath, privateKeyPath } = keyPaths(config);
  if (!fs.existsSync(privateKeyPath)) {
    throw new CommandError(
      `No private key at ${privateKeyPath}`,
      { suggestion: 'Create a key pair with: pwvault keygen' },
      EXIT_CODES.RESOURCE_NOT_FOUND
    );
  }
  return RsaKeyPair.load(publicKeyPath, privateKeyPath);
}

/**
 * Session bound to the configured server and the stored key pair.
 */
export async function openSession(config: VaultConfig): Promise<AuthenticatedSession> {
  const keys = await loadKeys(config);
  const client = new ProtocolClient(toClientOptions(config));
  return new AuthenticatedSession(client, { keys, keysDirectory: config.keysDir });
}

/**
 * Open a session and log `userName` in.
 *
 * @throws CommandError when the server refuses the login
 */
export async function openLoggedInSession(
  config: VaultConfig,
  userName: string
): Promise<AuthenticatedSession> {
  const session = await openSession(config);
  if (!(await session.login(userName))) {
    throw new CommandError(
      loginRefusedError(userName),
      { suggestion: `Register first with: pwvault register ${userName}` },
      EXIT_CODES.PERMISSION_DENIED
    );
  }
  return session;
}
