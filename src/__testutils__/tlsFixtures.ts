/**
 * Self-signed TLS material for the mock vault server, generated in process.
 */

import { X509Certificate, generateKeyPairSync } from 'node:crypto';

import forge from 'node-forge';

export interface TlsFixture {
  key: string;
  cert: string;
  /** SHA-256 fingerprint as Node reports it (`AB:CD:...`) */
  fingerprint256: string;
}

/**
 * Certificate for 127.0.0.1 and localhost, valid from a minute ago for one day.
 */
export function createSelfSignedCertificate(commonName = 'localhost'): TlsFixture {
  const { publicKey, privateKey } = generateKeyPairSync('rsa', {
    modulusLength: 2048,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
  });

  const cert = forge.pki.createCertificate();
  cert.publicKey = forge.pki.publicKeyFromPem(publicKey);
  cert.serialNumber = '01';
  cert.validity.notBefore = new Date(Date.now() - 60_000);
  cert.validity.notAfter = new Date(Date.now() + 24 * 60 * 60 * 1000);

  const subject = [{ name: 'commonName', value: commonName }];
  cert.setSubject(subject);
  cert.setIssuer(subject);
  cert.setExtensions([
    { name: 'basicConstraints', cA: true },
    {
      name: 'subjectAltName',
      altNames: [
        { type: 2, value: 'localhost' },
        { type: 7, ip: '127.0.0.1' },
      ],
    },
  ]);
  cert.sign(forge.pki.privateKeyFromPem(privateKey), forge.md.sha256.create());

  const certPem = forge.pki.certificateToPem(cert);
  return {
    key: privateKey,
    cert: certPem,
    fingerprint256: new X509Certificate(certPem).fingerprint256,
  };
}
