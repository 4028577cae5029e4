/**
 * TLS peer verification strategies.
 *
 * The encrypted transport always authenticates the server before any protocol
 * bytes are sent. A strategy contributes options to `tls.connect` and gets the
 * last word on the connected socket.
 */

import { rootCertificates } from 'node:tls';
import type { ConnectionOptions, TLSSocket } from 'node:tls';

import { CertificateError } from '@/protocol/errors.js';

export type VerifierConnectOptions = Pick<ConnectionOptions, 'ca' | 'rejectUnauthorized'>;

/**
 * Certificate verification strategy for the encrypted transport.
 */
export interface CertificateVerifier {
  /** Short label for logs */
  readonly description: string;

  /** Options merged into `tls.connect` */
  connectOptions(): VerifierConnectOptions;

  /**
   * Inspect the socket after the handshake.
   *
   * @returns The rejection, or null to accept the peer
   */
  verify(socket: TLSSocket): CertificateError | null;
}

/**
 * Verify the chain against Node's trust store (plus optional extra CAs) and the
 * certificate identity against the expected server name.
 */
export class SystemTrustVerifier implements CertificateVerifier {
  readonly description: string;
  private readonly extraCa: ReadonlyArray<string | Buffer>;

  constructor(extraCa: ReadonlyArray<string | Buffer> = []) {
    this.extraCa = extraCa;
    this.description =
      extraCa.length > 0 ? `system trust store + ${extraCa.length} extra CA` : 'system trust store';
  }

  connectOptions(): VerifierConnectOptions {
    if (this.extraCa.length === 0) {
      return { rejectUnauthorized: true };
    }
    return { ca: [...rootCertificates, ...this.extraCa], rejectUnauthorized: true };
  }

  verify(socket: TLSSocket): CertificateError | null {
    if (socket.authorized) {
      return null;
    }
    return new CertificateError(
      `TLS peer not authorized: ${String(socket.authorizationError ?? 'unknown reason')}`
    );
  }
}

/**
 * Accept exactly one certificate, identified by its SHA-256 fingerprint.
 *
 * For servers running with a self-signed certificate: no CA is consulted, but
 * any certificate other than the pinned one is rejected.
 */
export class PinnedCertificateVerifier implements CertificateVerifier {
  readonly description: string;
  private readonly fingerprint: string;

  constructor(fingerprint256: string) {
    const normalized = normalizeFingerprint(fingerprint256);
    if (!/^[0-9A-F]{64}$/.test(normalized)) {
      throw new CertificateError(
        `Pinned fingerprint must be 32 hex-encoded bytes, got ${JSON.stringify(fingerprint256)}`
      );
    }
    this.fingerprint = normalized;
    this.description = `pinned certificate ${normalized.slice(0, 16)}...`;
  }

  connectOptions(): VerifierConnectOptions {
    return { rejectUnauthorized: false };
  }

  verify(socket: TLSSocket): CertificateError | null {
    const { fingerprint256 } = socket.getPeerCertificate();
    if (!fingerprint256) {
      return new CertificateError('TLS peer presented no certificate');
    }
    const presented = normalizeFingerprint(fingerprint256);
    if (presented !== this.fingerprint) {
      return new CertificateError(
        `TLS peer certificate fingerprint ${presented} does not match pinned ${this.fingerprint}`
      );
    }
    return null;
  }
}

/**
 * Uppercase hex without separators, so `ab:cd` and `ABCD` compare equal.
 */
export function normalizeFingerprint(fingerprint: string): string {
  return fingerprint.replace(/[:\s]/g, '').toUpperCase();
}
