/**
 * Transport Error Classification
 *
 * Maps Node's socket and TLS errors onto the vault error taxonomy by their
 * portable `code` values rather than by platform error numbers.
 */

import {
  CertificateError,
  ConnectionRefusedError,
  ConnectionTimedOutError,
  UnknownTransportError,
  VaultError,
} from '@/protocol/errors.js';
import { getErrorCode, getErrorMessage } from '@/utils/errors.js';

const REFUSED_CODES = new Set(['ECONNREFUSED']);

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT']);

const CERTIFICATE_CODES = new Set([
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_REVOKED',
  'CERT_UNTRUSTED',
  'CERT_REJECTED',
  'CERT_SIGNATURE_FAILURE',
  'HOSTNAME_MISMATCH',
  'ERR_TLS_CERT_ALTNAME_INVALID',
]);

/**
 * Where the exchange was when the fault happened, for the error message.
 */
export interface TransportErrorContext {
  host: string;
  port: number;
  stage: 'connect' | 'send' | 'receive';
}

function describeEndpoint(context: TransportErrorContext): string {
  return `${context.host}:${context.port}`;
}

/**
 * Classify a raw error raised by the socket layer.
 *
 * Errors that are already part of the vault taxonomy pass through unchanged.
 */
export function classifyTransportError(error: unknown, context: TransportErrorContext): VaultError {
  if (error instanceof VaultError) {
    return error;
  }

  const code = getErrorCode(error);
  const endpoint = describeEndpoint(context);
  const details = [
    ...(code ? [`Code: ${code}`] : []),
    `Details: ${getErrorMessage(error)}`,
  ].join(' | ');

  if (code && REFUSED_CODES.has(code)) {
    return new ConnectionRefusedError(`Connection to ${endpoint} refused | ${details}`, error);
  }
  if (code && TIMEOUT_CODES.has(code)) {
    return new ConnectionTimedOutError(
      `Connection to ${endpoint} timed out during ${context.stage} | ${details}`,
      error
    );
  }
  if (code && CERTIFICATE_CODES.has(code)) {
    return new CertificateError(`Certificate of ${endpoint} rejected | ${details}`, error);
  }
  return new UnknownTransportError(
    `Transport error during ${context.stage} with ${endpoint} | ${details}`,
    error
  );
}

/**
 * Build the error raised when the socket stays idle past the read timeout.
 */
export function formatTimeoutError(
  context: TransportErrorContext,
  timeoutMs: number
): ConnectionTimedOutError {
  return new ConnectionTimedOutError(
    `No data from ${describeEndpoint(context)} during ${context.stage} for ${timeoutMs / 1000}s`
  );
}
