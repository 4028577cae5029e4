/**
 * Common error messages and patterns.
 *
 * Centralized location for reusable error messages with consistent formatting.
 */

import type { VaultError } from '@/protocol/errors.js';

/**
 * Prefix a failure message for stderr.
 *
 * @example
 * ```typescript
 * console.error(genericError('Connection to 127.0.0.1:8820 refused'));
 * ```
 */
export function genericError(message: string): string {
  return `Error: ${message}`;
}

export function unknownError(): string {
  return 'Error: Unknown error';
}

/**
 * Hint shown under a vault client error, keyed by its code.
 *
 * @returns The hint, or undefined for codes with nothing useful to add
 */
export function vaultErrorSuggestion(error: Pick<VaultError, 'code'>): string | undefined {
  switch (error.code) {
    case 'CONNECTION_REFUSED':
      return 'Check that the vault server is running at the configured host and port';
    case 'CONNECTION_TIMED_OUT':
      return 'The server did not answer in time; raise it with --timeout <ms>';
    case 'TRANSPORT_ERROR':
      return 'Check the host name and your network connection';
    case 'CERTIFICATE_REJECTED':
      return 'Trust the server with PWVAULT_CA_FILE, or pin its certificate with PWVAULT_FINGERPRINT';
    case 'FRAMING_ERROR':
      return 'The server sent a malformed frame; check that TLS is set the same on both ends';
    case 'CRYPTO_ERROR':
      return 'Check the key files, or create new ones with: pwvault keygen --force';
    case 'INVALID_INPUT':
      return 'User names and sources are limited to printable ASCII; passwords may be any text';
    case 'CONFIG_ERROR':
      return 'Check config.json and the PWVAULT_* environment variables';
    default:
      return undefined;
  }
}
