import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { createTestHome, removeTestHome } from '@/__testutils__/testHome.js';
import {
  ConfigError,
  buildVerifier,
  keyPaths,
  loadConfig,
  toClientOptions,
} from '@/config/config.js';
import { getConfigDir, getConfigFilePath } from '@/config/paths.js';
import { PinnedCertificateVerifier, SystemTrustVerifier } from '@/transport/verification.js';

void describe('Client paths', () => {
  void it('uses PWVAULT_HOME when set', () => {
    assert.equal(getConfigDir({ PWVAULT_HOME: '/tmp/vault-home' }), '/tmp/vault-home');
    assert.equal(getConfigFilePath({ PWVAULT_HOME: '/tmp/vault-home' }), '/tmp/vault-home/config.json');
  });

  void it('falls back to ~/.pwvault', () => {
    assert.equal(getConfigDir({}), path.join(os.homedir(), '.pwvault'));
  });
});

void describe('loadConfig', () => {
  let home: string;
  let env: NodeJS.ProcessEnv;

  beforeEach(() => {
    home = createTestHome();
    env = { PWVAULT_HOME: home };
  });

  afterEach(() => {
    removeTestHome(home);
  });

  function writeConfig(content: string): void {
    fs.writeFileSync(path.join(home, 'config.json'), content);
  }

  void it('starts from the defaults', () => {
    assert.deepEqual(loadConfig({ env }), {
      host: '127.0.0.1',
      port: 8820,
      tls: true,
      timeoutMs: 120_000,
      keysDir: path.join(home, 'keys'),
      publicKeyFile: 'public.der',
      privateKeyFile: 'private.der',
    });
  });

  void it('reads config.json, resolving paths against its directory', () => {
    writeConfig(
      JSON.stringify({ host: 'vault.example', port: 9000, tls: false, keysDir: 'my-keys', caFile: 'ca.pem' })
    );

    const config = loadConfig({ env });

    assert.equal(config.host, 'vault.example');
    assert.equal(config.port, 9000);
    assert.equal(config.tls, false);
    assert.equal(config.keysDir, path.join(home, 'my-keys'));
    assert.equal(config.caFile, path.join(home, 'ca.pem'));
  });

  void it('lets the environment override the file', () => {
    writeConfig(JSON.stringify({ port: 9000, tls: false }));

    const config = loadConfig({
      env: { ...env, PWVAULT_PORT: '9100', PWVAULT_TLS: 'yes', PWVAULT_TIMEOUT_MS: '5000' },
    });

    assert.equal(config.port, 9100);
    assert.equal(config.tls, true);
    assert.equal(config.timeoutMs, 5000);
  });

  void it('lets explicit overrides win over everything', () => {
    const config = loadConfig({
      env: { ...env, PWVAULT_HOST: 'env.example' },
      overrides: { host: 'flag.example', tls: false },
    });

    assert.equal(config.host, 'flag.example');
    assert.equal(config.tls, false);
  });

  void it('ignores empty environment values', () => {
    assert.equal(loadConfig({ env: { ...env, PWVAULT_PORT: '  ' } }).port, 8820);
  });

  void it('rejects invalid values with ConfigError', () => {
    assert.throws(
      () => loadConfig({ env: { ...env, PWVAULT_PORT: 'eighty' } }),
      (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.equal(error.message, 'PWVAULT_PORT: port must be an integer between 1 and 65535');
        assert.equal(error.exitCode, 81);
        return true;
      }
    );
    assert.throws(() => loadConfig({ env: { ...env, PWVAULT_TLS: 'maybe' } }), /expected a boolean/);
    assert.throws(() => loadConfig({ env, overrides: { port: Number('x') } }), /--port/);
    assert.throws(() => loadConfig({ env, overrides: { timeoutMs: 0 } }), /--timeout/);
  });

  void it('rejects a malformed config file', () => {
    writeConfig('{ not json');
    assert.throws(() => loadConfig({ env }), /is not valid JSON/);

    writeConfig('[1, 2]');
    assert.throws(() => loadConfig({ env }), /must contain a JSON object/);

    writeConfig(JSON.stringify({ port: 70000 }));
    assert.throws(() => loadConfig({ env }), ConfigError);
  });

  void it('ignores unknown settings', () => {
    writeConfig(JSON.stringify({ colour: 'blue', port: 9001 }));

    assert.equal(loadConfig({ env }).port, 9001);
  });

  void it('reads an explicitly named config file', () => {
    const other = path.join(home, 'other.json');
    fs.writeFileSync(other, JSON.stringify({ host: 'other.example' }));

    assert.equal(loadConfig({ env, configFile: other }).host, 'other.example');
  });
});

void describe('Derived connection settings', () => {
  let home: string;

  beforeEach(() => {
    home = createTestHome();
  });

  afterEach(() => {
    removeTestHome(home);
  });

  function config(overrides: Parameters<typeof loadConfig>[0] = {}): ReturnType<typeof loadConfig> {
    return loadConfig({ env: { PWVAULT_HOME: home }, ...overrides });
  }

  void it('pins the certificate when a fingerprint is configured', () => {
    const verifier = buildVerifier(config({ overrides: { fingerprint: 'AB'.repeat(32), caFile: '/nope' } }));

    assert.ok(verifier instanceof PinnedCertificateVerifier);
  });

  void it('extends the system trust store with a configured CA file', () => {
    const caFile = path.join(home, 'ca.pem');
    fs.writeFileSync(caFile, '-----BEGIN CERTIFICATE-----\n');

    const verifier = buildVerifier(config({ overrides: { caFile } }));

    assert.ok(verifier instanceof SystemTrustVerifier);
    assert.equal(verifier.description, 'system trust store + 1 extra CA');
  });

  void it('fails on an unreadable CA file', () => {
    assert.throws(
      () => buildVerifier(config({ overrides: { caFile: path.join(home, 'missing.pem') } })),
      /Cannot read CA file/
    );
  });

  void it('defaults to the system trust store', () => {
    assert.equal(buildVerifier(config()).description, 'system trust store');
  });

  void it('builds client options without a verifier for plain connections', () => {
    assert.deepEqual(toClientOptions(config({ overrides: { tls: false, port: 9000 } })), {
      host: '127.0.0.1',
      port: 9000,
      tls: false,
      timeoutMs: 120_000,
    });
  });

  void it('passes the server name through for TLS', () => {
    const options = toClientOptions(config({ overrides: { servername: 'vault.example' } }));

    assert.equal(options.servername, 'vault.example');
    assert.ok(options.verifier instanceof SystemTrustVerifier);
  });

  void it('joins key file names onto the key directory', () => {
    assert.deepEqual(keyPaths(config({ overrides: { keysDir: '/keys' } })), {
      publicKeyPath: path.join('/keys', 'public.der'),
      privateKeyPath: path.join('/keys', 'private.der'),
    });
  });
});
