/**
 * TLS verification contract tests against an in-process TLS vault server
 * with a self-signed certificate for 127.0.0.1.
 */

import assert from 'node:assert/strict';
import { after, before, describe, it } from 'node:test';

import { MockVaultServer } from '@/__testutils__/MockVaultServer.js';
import { createSelfSignedCertificate } from '@/__testutils__/tlsFixtures.js';
import type { TlsFixture } from '@/__testutils__/tlsFixtures.js';
import { buildRequest } from '@/client/ProtocolClient.js';
import { CertificateError } from '@/protocol/errors.js';
import { Transport, withTransport } from '@/transport/Transport.js';
import {
  PinnedCertificateVerifier,
  SystemTrustVerifier,
  normalizeFingerprint,
} from '@/transport/verification.js';
import type { CertificateVerifier } from '@/transport/verification.js';

const OTHER_FINGERPRINT = '00'.repeat(32);

void describe('TLS certificate verification', () => {
  let fixture: TlsFixture;
  let server: MockVaultServer;

  before(async () => {
    fixture = createSelfSignedCertificate();
    server = new MockVaultServer({ tls: { key: fixture.key, cert: fixture.cert } });
    await server.start();
  });

  after(async () => {
    await server.stop();
  });

  function open(verifier: CertificateVerifier, servername?: string): Promise<Transport> {
    return Transport.open({
      host: '127.0.0.1',
      port: server.port,
      tls: true,
      verifier,
      ...(servername !== undefined ? { servername } : {}),
    });
  }

  void it('accepts the pinned certificate and carries a full exchange', async () => {
    const response = await withTransport(
      {
        host: '127.0.0.1',
        port: server.port,
        tls: true,
        verifier: new PinnedCertificateVerifier(fixture.fingerprint256),
      },
      async (transport) => {
        await transport.send(buildRequest('get_sources', '', '-').toBytes());
        return transport.receiveFramedMessage();
      }
    );

    assert.equal(response.method, 'get_sources');
    assert.equal(response.session, '-');
  });

  void it('rejects a certificate other than the pinned one', async () => {
    await assert.rejects(open(new PinnedCertificateVerifier(OTHER_FINGERPRINT)), (error: unknown) => {
      assert.ok(error instanceof CertificateError);
      assert.match(error.message, /does not match pinned/);
      return true;
    });
  });

  void it('rejects a self-signed certificate under the system trust store', async () => {
    await assert.rejects(open(new SystemTrustVerifier()), CertificateError);
  });

  void it('accepts the certificate once its CA is trusted', async () => {
    const transport = await open(new SystemTrustVerifier([fixture.cert]));
    transport.close();
  });

  void it('rejects a trusted certificate issued for another name', async () => {
    await assert.rejects(
      open(new SystemTrustVerifier([fixture.cert]), 'vault.example'),
      CertificateError
    );
  });
});

void describe('PinnedCertificateVerifier', () => {
  void it('accepts fingerprints with or without separators', () => {
    const colonSeparated = Array.from({ length: 32 }, () => 'ab').join(':');

    assert.match(new PinnedCertificateVerifier(colonSeparated).description, /^pinned certificate ABABABABABABABAB\.\.\.$/);
    assert.ok(new PinnedCertificateVerifier('ab'.repeat(32)));
  });

  void it('rejects a fingerprint that is not 32 bytes of hex', () => {
    assert.throws(() => new PinnedCertificateVerifier('abcd'), CertificateError);
    assert.throws(() => new PinnedCertificateVerifier('zz'.repeat(32)), CertificateError);
  });

  void it('turns off chain validation so the pin decides', () => {
    assert.deepEqual(new PinnedCertificateVerifier(OTHER_FINGERPRINT).connectOptions(), {
      rejectUnauthorized: false,
    });
  });
});

void describe('SystemTrustVerifier', () => {
  void it('leaves the default CA list alone without extras', () => {
    const verifier = new SystemTrustVerifier();

    assert.deepEqual(verifier.connectOptions(), { rejectUnauthorized: true });
    assert.equal(verifier.description, 'system trust store');
  });

  void it('adds extra CAs on top of the root certificates', () => {
    const verifier = new SystemTrustVerifier(['-----BEGIN CERTIFICATE-----']);
    const { ca, rejectUnauthorized } = verifier.connectOptions();

    assert.equal(rejectUnauthorized, true);
    assert.ok(Array.isArray(ca));
    assert.equal(ca.at(-1), '-----BEGIN CERTIFICATE-----');
    assert.equal(verifier.description, 'system trust store + 1 extra CA');
  });
});

void describe('normalizeFingerprint', () => {
  void it('uppercases and strips separators', () => {
    assert.equal(normalizeFingerprint('ab:cd ef'), 'ABCDEF');
  });
});
