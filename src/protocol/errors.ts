/**
 * Vault client error classes.
 *
 * Every fault the core raises is one of these classes, so callers can branch on
 * `instanceof` or `code` and the CLI can map each one to a semantic exit code.
 * Semantic failures reported by the server in a response body are not errors;
 * see `interpretReply` in `@/vault/replies.js`.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Base error class for all vault client errors.
 *
 * Carries an error code for programmatic handling, an exit code for the CLI,
 * and optional cause chaining for wrapped errors.
 */
export abstract class VaultError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Base class for faults of the underlying connection.
 */
export abstract class TransportError extends VaultError {}

/**
 * Remote endpoint is not accepting connections.
 */
export class ConnectionRefusedError extends TransportError {
  readonly code = 'CONNECTION_REFUSED';
  readonly exitCode = EXIT_CODES.CONNECTION_FAILURE;
}

/**
 * No connection or no response within the configured timeout.
 */
export class ConnectionTimedOutError extends TransportError {
  readonly code = 'CONNECTION_TIMED_OUT';
  readonly exitCode = EXIT_CODES.CONNECTION_TIMEOUT;
}

/**
 * Any other transport-level fault (reset, unreachable host, DNS failure).
 */
export class UnknownTransportError extends TransportError {
  readonly code = 'TRANSPORT_ERROR';
  readonly exitCode = EXIT_CODES.CONNECTION_FAILURE;
}

/**
 * TLS peer failed identity validation.
 *
 * Examples:
 * - Self-signed certificate without a matching pin
 * - Certificate issued for a different host
 * - Pinned fingerprint mismatch
 */
export class CertificateError extends TransportError {
  readonly code = 'CERTIFICATE_REJECTED';
  readonly exitCode = EXIT_CODES.CERTIFICATE_REJECTED;
}

/**
 * A frame violates the wire format.
 *
 * Examples:
 * - Direction tag other than `req`/`res`
 * - Connection closed before the announced byte count arrived
 * - Missing `Content-Length` header
 * - Header block length disagreeing with its entries
 */
export class FramingError extends VaultError {
  readonly code = 'FRAMING_ERROR';
  readonly exitCode = EXIT_CODES.FRAMING_ERROR;
}

/**
 * Key import/export, encryption or decryption failed.
 */
export class CryptoError extends VaultError {
  readonly code = 'CRYPTO_ERROR';
  readonly exitCode = EXIT_CODES.CRYPTO_ERROR;
}

/**
 * Operation issued in a session state that does not allow it.
 */
export class SessionStateError extends VaultError {
  readonly code = 'SESSION_STATE';
  readonly exitCode = EXIT_CODES.SESSION_STATE;
}

/**
 * Caller-supplied text the protocol cannot carry.
 *
 * User names and sources travel as ASCII bodies; anything else would reach the
 * server altered.
 */
export class InvalidInputError extends VaultError {
  readonly code = 'INVALID_INPUT';
  readonly exitCode = EXIT_CODES.INVALID_ARGUMENTS;
}
