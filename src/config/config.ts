/**
 * Client configuration.
 *
 * Settings are layered, later layers winning:
 * 1. Built-in defaults
 * 2. `config.json` in the client directory (see `getConfigDir`)
 * 3. `PWVAULT_*` environment variables
 * 4. Explicit overrides (CLI flags)
 */

import * as fs from 'fs';
import * as path from 'path';

import {
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_PRIVATE_KEY_FILE,
  DEFAULT_PUBLIC_KEY_FILE,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_TLS,
} from '@/constants.js';
import type { ProtocolClientOptions } from '@/client/ProtocolClient.js';
import { VaultError } from '@/protocol/errors.js';
import { PinnedCertificateVerifier, SystemTrustVerifier } from '@/transport/verification.js';
import type { CertificateVerifier } from '@/transport/verification.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorCode, getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

import { getConfigFilePath, getDefaultKeysDir } from './paths.js';

const log = createLogger('config');

const MAX_PORT = 65535;

/**
 * Fully resolved client configuration.
 */
export interface VaultConfig {
  host: string;
  port: number;
  /** Wrap connections in TLS */
  tls: boolean;
  /** Idle timeout for connect and read, in milliseconds */
  timeoutMs: number;
  /** Directory holding the key pair */
  keysDir: string;
  publicKeyFile: string;
  privateKeyFile: string;
  /** PEM file with an extra CA to trust */
  caFile?: string;
  /** SHA-256 fingerprint of the one server certificate to accept */
  fingerprint?: string;
  /** Expected TLS server name, when it differs from host */
  servername?: string;
}

export type ConfigOverrides = Partial<VaultConfig>;

/**
 * Invalid configuration value in the file, environment or flags.
 */
export class ConfigError extends VaultError {
  readonly code = 'CONFIG_ERROR';
  readonly exitCode = EXIT_CODES.INVALID_ARGUMENTS;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Config file to read instead of `<configDir>/config.json` */
  configFile?: string;
  overrides?: ConfigOverrides;
}

// ============================================================================
// Value parsing
// ============================================================================

function parsePort(value: unknown, source: string): number {
  const port = typeof value === 'string' && /^[0-9]+$/.test(value) ? Number(value) : value;
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > MAX_PORT) {
    throw new ConfigError(`${source}: port must be an integer between 1 and ${MAX_PORT}`);
  }
  return port;
}

function parseTimeout(value: unknown, source: string): number {
  const timeout = typeof value === 'string' && /^[0-9]+$/.test(value) ? Number(value) : value;
  if (typeof timeout !== 'number' || !Number.isInteger(timeout) || timeout <= 0) {
    throw new ConfigError(`${source}: timeout must be a positive integer (milliseconds)`);
  }
  return timeout;
}

function parseBoolean(value: unknown, source: string): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  }
  throw new ConfigError(`${source}: expected a boolean, got ${JSON.stringify(value)}`);
}

function parseString(value: unknown, source: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigError(`${source}: expected a non-empty string`);
  }
  return value.trim();
}

// ============================================================================
// Layers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read `config.json`. A missing file is an empty layer.
 *
 * Relative paths in the file resolve against the file's directory.
 */
export function readConfigFile(filePath: string): ConfigOverrides {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      log.debug(`No config file at ${filePath}`);
      return {};
    }
    throw new ConfigError(`Cannot read ${filePath}: ${getErrorMessage(error)}`, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`${filePath} is not valid JSON: ${getErrorMessage(error)}`, error);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${filePath} must contain a JSON object`);
  }

  const baseDir = path.dirname(filePath);
  const layer: ConfigOverrides = {};
  for (const [key, value] of Object.entries(parsed)) {
    const source = `${filePath} "${key}"`;
    switch (key) {
      case 'host':
        layer.host = parseString(value, source);
        break;
      case 'port':
        layer.port = parsePort(value, source);
        break;
      case 'tls':
        layer.tls = parseBoolean(value, source);
        break;
      case 'timeoutMs':
        layer.timeoutMs = parseTimeout(value, source);
        break;
      case 'keysDir':
        layer.keysDir = path.resolve(baseDir, parseString(value, source));
        break;
      case 'publicKeyFile':
        layer.publicKeyFile = parseString(value, source);
        break;
      case 'privateKeyFile':
        layer.privateKeyFile = parseString(value, source);
        break;
      case 'caFile':
        layer.caFile = path.resolve(baseDir, parseString(value, source));
        break;
      case 'fingerprint':
        layer.fingerprint = parseString(value, source);
        break;
      case 'servername':
        layer.servername = parseString(value, source);
        break;
      default:
        log.info(`Ignoring unknown setting "${key}" in ${filePath}`);
    }
  }
  log.debug(`Loaded ${Object.keys(layer).length} setting(s) from ${filePath}`);
  return layer;
}

/**
 * Settings from `PWVAULT_*` environment variables. Empty values are ignored.
 */
export function readEnvironment(env: NodeJS.ProcessEnv): ConfigOverrides {
  const layer: ConfigOverrides = {};
  const get = (name: string): string | undefined => {
    const value = env[name];
    return value !== undefined && value.trim().length > 0 ? value.trim() : undefined;
  };

  const host = get('PWVAULT_HOST');
  if (host !== undefined) layer.host = host;
  const port = get('PWVAULT_PORT');
  if (port !== undefined) layer.port = parsePort(port, 'PWVAULT_PORT');
  const tls = get('PWVAULT_TLS');
  if (tls !== undefined) layer.tls = parseBoolean(tls, 'PWVAULT_TLS');
  const timeout = get('PWVAULT_TIMEOUT_MS');
  if (timeout !== undefined) layer.timeoutMs = parseTimeout(timeout, 'PWVAULT_TIMEOUT_MS');
  const keysDir = get('PWVAULT_KEYS_DIR');
  if (keysDir !== undefined) layer.keysDir = path.resolve(keysDir);
  const caFile = get('PWVAULT_CA_FILE');
  if (caFile !== undefined) layer.caFile = path.resolve(caFile);
  const fingerprint = get('PWVAULT_FINGERPRINT');
  if (fingerprint !== undefined) layer.fingerprint = fingerprint;
  return layer;
}

/**
 * Resolve the effective configuration.
 *
 * @throws ConfigError on an unreadable file or an invalid value in any layer
 */
export function loadConfig(options: LoadConfigOptions = {}): VaultConfig {
  const env = options.env ?? process.env;
  const defaults: VaultConfig = {
    host: DEFAULT_HOST,
    port: DEFAULT_PORT,
    tls: DEFAULT_TLS,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    keysDir: getDefaultKeysDir(env),
    publicKeyFile: DEFAULT_PUBLIC_KEY_FILE,
    privateKeyFile: DEFAULT_PRIVATE_KEY_FILE,
  };
  const fileLayer = readConfigFile(options.configFile ?? getConfigFilePath(env));
  const envLayer = readEnvironment(env);
  const overrides = options.overrides ?? {};

  if (overrides.port !== undefined) parsePort(overrides.port, '--port');
  if (overrides.timeoutMs !== undefined) parseTimeout(overrides.timeoutMs, '--timeout');

  const config: VaultConfig = { ...defaults, ...fileLayer, ...envLayer, ...overrides };
  log.debug(`Vault at ${config.host}:${config.port}${config.tls ? ' (TLS)' : ''}`);
  return config;
}

// ============================================================================
// Derived objects
// ============================================================================

/**
 * Pick the certificate strategy: a pinned fingerprint wins over a CA file,
 * which extends the system trust store.
 *
 * @throws ConfigError when the CA file cannot be read
 * @throws CertificateError when the fingerprint is malformed
 */
export function buildVerifier(config: VaultConfig): CertificateVerifier {
  if (config.fingerprint !== undefined) {
    return new PinnedCertificateVerifier(config.fingerprint);
  }
  if (config.caFile !== undefined) {
    let ca: Buffer;
    try {
      ca = fs.readFileSync(config.caFile);
    } catch (error) {
      throw new ConfigError(`Cannot read CA file ${config.caFile}: ${getErrorMessage(error)}`, error);
    }
    return new SystemTrustVerifier([ca]);
  }
  return new SystemTrustVerifier();
}

/**
 * Connection options for `ProtocolClient`.
 */
export function toClientOptions(config: VaultConfig): ProtocolClientOptions {
  return {
    host: config.host,
    port: config.port,
    tls: config.tls,
    timeoutMs: config.timeoutMs,
    ...(config.tls ? { verifier: buildVerifier(config) } : {}),
    ...(config.servername !== undefined ? { servername: config.servername } : {}),
  };
}

/**
 * Full paths of the public and private key files.
 */
export function keyPaths(config: VaultConfig): { publicKeyPath: string; privateKeyPath: string } {
  return {
    publicKeyPath: path.join(config.keysDir, config.publicKeyFile),
    privateKeyPath: path.join(config.keysDir, config.privateKeyFile),
  };
}
