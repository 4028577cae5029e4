/**
 * Client directory layout.
 *
 * Everything the client keeps on disk lives under ~/.pwvault/ unless
 * PWVAULT_HOME points elsewhere.
 */

import * as os from 'os';
import * as path from 'path';

import { CONFIG_DIR_NAME, CONFIG_FILE_NAME, KEYS_DIR_NAME } from '@/constants.js';

const HOME_OVERRIDE_ENV = 'PWVAULT_HOME';

/**
 * Get the client directory (~/.pwvault or $PWVAULT_HOME).
 *
 * Reads the environment on every call so tests can redirect it.
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[HOME_OVERRIDE_ENV];
  if (override && override.trim().length > 0) {
    return path.resolve(override);
  }
  return path.join(os.homedir(), CONFIG_DIR_NAME);
}

export function getConfigFilePath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getConfigDir(env), CONFIG_FILE_NAME);
}

export function getDefaultKeysDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getConfigDir(env), KEYS_DIR_NAME);
}
