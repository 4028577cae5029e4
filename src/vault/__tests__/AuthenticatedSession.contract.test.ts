/**
 * AuthenticatedSession Contract Tests
 *
 * Contract:
 * - Input: account, login and password operations
 * - Output: raw server responses; session state transitions
 * - Behavior: challenge-response login, client-side password encryption,
 *   state checks before any request leaves the process
 */

import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { after, afterEach, before, beforeEach, describe, it } from 'node:test';

import { MockVaultServer } from '@/__testutils__/MockVaultServer.js';
import { createTestHome, removeTestHome } from '@/__testutils__/testHome.js';
import type { Exchanger } from '@/client/ProtocolClient.js';
import { ProtocolClient } from '@/client/ProtocolClient.js';
import { Direction } from '@/protocol/constants.js';
import type { ContentType, VaultMethod } from '@/protocol/constants.js';
import {
  CryptoError,
  FramingError,
  InvalidInputError,
  SessionStateError,
} from '@/protocol/errors.js';
import { Message } from '@/protocol/message.js';
import { AuthenticatedSession, SessionState } from '@/vault/AuthenticatedSession.js';
import { RsaKeyPair } from '@/vault/keys.js';
import { interpretReply, parseSources } from '@/vault/replies.js';

interface RecordedCall {
  method: VaultMethod;
  body: string;
  session: string;
  contentType: ContentType | undefined;
}

/**
 * Exchanger that answers from a queue of canned responses.
 */
class ScriptedExchanger implements Exchanger {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly responses: Message[]) {}

  exchange(
    method: VaultMethod,
    body: Uint8Array | string,
    session: string,
    contentType?: ContentType
  ): Promise<Message> {
    this.calls.push({
      method,
      body: typeof body === 'string' ? body : Buffer.from(body).toString('latin1'),
      session,
      contentType,
    });
    const next = this.responses.shift();
    return next ? Promise.resolve(next) : Promise.reject(new Error(`no scripted response for ${method}`));
  }
}

function reply(headers: Array<[string, string]>, body: string | Buffer = ''): Message {
  return new Message(
    Direction.Response,
    headers,
    typeof body === 'string' ? Buffer.from(body, 'latin1') : body
  );
}

void describe('AuthenticatedSession against the mock vault', () => {
  let keys: RsaKeyPair;
  let server: MockVaultServer;
  let session: AuthenticatedSession;

  before(() => {
    keys = RsaKeyPair.generate();
  });

  beforeEach(async () => {
    server = new MockVaultServer();
    const port = await server.start();
    session = new AuthenticatedSession(
      new ProtocolClient({ host: '127.0.0.1', port, tls: false, timeoutMs: 2000 }),
      { keys }
    );
  });

  afterEach(async () => {
    await server.stop();
  });

  void it('registers, logs in, stores and reads back a password', async () => {
    const created = await session.createUser('alice');
    assert.equal(created.bodyText(), 'Success');
    assert.equal(session.state, SessionState.Anonymous);

    const challenge = await session.loginRequest('alice');
    assert.equal(challenge.session, 'S1');
    assert.equal(challenge.body.length, 256);
    assert.equal(session.state, SessionState.AwaitingChallenge);
    assert.equal(session.challengeToken, 'S1');

    const expectedNumber = server.loginNumber('S1');
    assert.ok(expectedNumber);
    assert.equal(expectedNumber.length, 8);
    assert.ok(keys.decrypt(challenge.body).equals(expectedNumber));

    const verdict = await session.loginTest(challenge.body, 'S1');
    assert.equal(verdict.bodyText(), 'Success');
    assert.equal(session.state, SessionState.Authenticated);
    assert.equal(session.sessionToken, 'S1');

    const stored = await session.setPassword('github', 'p@ss');
    assert.equal(stored.bodyText(), 'Success');
    const storedCiphertext = server.storedPassword('alice', 'github');
    assert.ok(storedCiphertext);
    assert.equal(keys.decrypt(storedCiphertext).toString('latin1'), 'p@ss');

    const fetched = await session.getPassword('github');
    assert.equal(session.decryptPassword(fetched.body), 'p@ss');

    assert.deepEqual(parseSources(await session.getSources()), ['github']);
  });

  void it('sends each operation with its session token and content type', async () => {
    await session.createUser('alice');
    assert.equal(await session.login('alice'), true);
    await session.setPassword('github', 'p@ss');
    await session.getSources();

    const summary = server.requests.map((request) => [
      request.method,
      request.session,
      request.contentType,
    ]);
    assert.deepEqual(summary, [
      ['create_user', '-', 'json'],
      ['login_request', '*', 'ascii'],
      ['login_test', 'S1', 'bytes'],
      ['set_password', 'S1', 'json'],
      ['get_sources', 'S1', undefined],
    ]);

    const createBody: unknown = JSON.parse(server.requests[0]?.bodyText() ?? '');
    assert.deepEqual(createBody, {
      userName: 'alice',
      publicKey: keys.exportPublicKey().toString('base64'),
    });
    assert.equal(server.requests[1]?.bodyText(), 'alice');
  });

  void it('returns to Anonymous when the challenge is tampered with', async () => {
    await session.createUser('alice');
    server.mode = 'tampered_challenge';

    const challenge = await session.loginRequest('alice');
    assert.equal(session.state, SessionState.AwaitingChallenge);

    await assert.rejects(session.loginTest(challenge.body, 'S1'), CryptoError);
    assert.equal(session.state, SessionState.Anonymous);
    assert.deepEqual(
      server.requests.map((request) => request.method),
      ['create_user', 'login_request']
    );
    assert.equal(session.sessionToken, null);
  });

  void it('stays Anonymous when the server has no challenge for the user', async () => {
    const response = await session.loginRequest('nobody');

    assert.equal(response.body.length, 0);
    assert.equal(session.state, SessionState.Anonymous);
    assert.equal(await session.login('nobody'), false);
  });

  void it('refuses operations before login without contacting the server', async () => {
    await assert.rejects(session.getSources(), SessionStateError);
    await assert.rejects(session.getPassword('github'), SessionStateError);
    await assert.rejects(session.setPassword('github', 'p@ss'), SessionStateError);
    await assert.rejects(session.deletePassword('github'), SessionStateError);
    await assert.rejects(session.deleteUser(), /delete_user requires a logged-in session \(state: anonymous\)/);

    assert.equal(server.requests.length, 0);
  });

  void it('reports a duplicate user as a failure body', async () => {
    await session.createUser('alice');
    const again = await session.createUser('alice');

    assert.deepEqual(interpretReply(again), {
      ok: false,
      reason: 'User with this username already exists, choose a different username',
    });
  });

  void it('deletes passwords and reports missing ones', async () => {
    await session.createUser('alice');
    await session.login('alice');
    await session.setPassword('github', 'p@ss');

    assert.equal((await session.deletePassword('github')).bodyText(), 'Success');
    assert.equal(
      (await session.deletePassword('github')).bodyText(),
      "Failed - password for source doesn't exist"
    );
    assert.equal((await session.getPassword('github')).body.length, 0);
  });

  void it('ends the session when the user is deleted', async () => {
    await session.createUser('alice');
    await session.login('alice');

    const deleted = await session.deleteUser();

    assert.equal(deleted.bodyText(), 'Success');
    assert.equal(session.state, SessionState.Anonymous);
    assert.deepEqual(server.userNames, []);
  });

  void it('serializes concurrent operations in call order', async () => {
    await session.createUser('alice');
    await session.login('alice');
    await session.setPassword('github', 'one');

    await Promise.all([
      session.getPassword('github'),
      session.getSources(),
      session.deletePassword('github'),
    ]);

    assert.deepEqual(
      server.requests.slice(-3).map((request) => request.method),
      ['get_password', 'get_sources', 'delete_password']
    );
  });

  void it('refuses a password too long for one RSA block', async () => {
    await session.createUser('alice');
    await session.login('alice');
    const sentBefore = server.requests.length;

    await assert.rejects(session.setPassword('github', 'x'.repeat(246)), CryptoError);
    assert.equal(server.requests.length, sentBefore);
  });

  void it('forgets the token on logout', async () => {
    await session.createUser('alice');
    await session.login('alice');

    session.logout();

    assert.equal(session.state, SessionState.Anonymous);
    await assert.rejects(session.getSources(), SessionStateError);
  });
});

void describe('AuthenticatedSession with scripted responses', () => {
  let keys: RsaKeyPair;

  before(() => {
    keys = RsaKeyPair.generate();
  });

  void it('rejects a challenge that arrives without a session token', async () => {
    const client = new ScriptedExchanger([reply([['Content-Length', '4']], 'abcd')]);
    const session = new AuthenticatedSession(client, { keys });

    await assert.rejects(session.loginRequest('alice'), FramingError);
    assert.equal(session.state, SessionState.Anonymous);
  });

  void it('returns to Anonymous when login_test fails', async () => {
    const challenge = keys.encrypt(Buffer.from('12345678', 'latin1'));
    const client = new ScriptedExchanger([
      reply([['Session', 'S1']], challenge),
      reply([['Session', 'S1']], 'Failed - incorrect number'),
    ]);
    const session = new AuthenticatedSession(client, { keys });

    assert.equal(await session.login('alice'), false);
    assert.equal(session.state, SessionState.Anonymous);
    assert.equal(client.calls[1]?.body, '12345678');
    assert.equal(client.calls[1]?.session, 'S1');
  });

  void it('returns to Anonymous when the exchange itself fails', async () => {
    const client = new ScriptedExchanger([]);
    const session = new AuthenticatedSession(client, { keys });

    await assert.rejects(
      session.loginTest(keys.encrypt(Buffer.from('12345678', 'latin1')), 'S1'),
      /no scripted response for login_test/
    );
    assert.equal(session.state, SessionState.Anonymous);
  });

  void it('stores non-ASCII passwords as UTF-8 and reads them back intact', async () => {
    const client = new ScriptedExchanger([
      reply([['Session', 'S1']], keys.encrypt(Buffer.from('abcdefgh', 'latin1'))),
      reply([['Session', 'S1']], 'Success'),
      reply([['Session', 'S1']], 'Success'),
    ]);
    const session = new AuthenticatedSession(client, { keys });
    await session.login('alice');

    await session.setPassword('github', 'пароль€');

    const sent: unknown = JSON.parse(client.calls[2]?.body ?? '');
    assert.ok(typeof sent === 'object' && sent !== null && 'password' in sent);
    assert.equal(typeof sent.password, 'string');
    const ciphertext = Buffer.from(String(sent.password), 'base64');
    assert.ok(keys.decrypt(ciphertext).equals(Buffer.from('пароль€', 'utf8')));
    assert.equal(session.decryptPassword(ciphertext), 'пароль€');
  });

  void it('refuses non-ASCII user names and sources before sending', async () => {
    const client = new ScriptedExchanger([
      reply([['Session', 'S1']], keys.encrypt(Buffer.from('abcdefgh', 'latin1'))),
      reply([['Session', 'S1']], 'Success'),
    ]);
    const session = new AuthenticatedSession(client, { keys });

    await assert.rejects(session.createUser('zoë'), InvalidInputError);
    await assert.rejects(session.loginRequest('алиса'), {
      name: 'InvalidInputError',
      message: 'The user name "алиса" must be printable ASCII',
    });
    assert.equal(client.calls.length, 0);

    await session.login('alice');
    await assert.rejects(session.setPassword('sklep-ś', 'p@ss'), InvalidInputError);
    await assert.rejects(session.getPassword('mail\n'), InvalidInputError);
    await assert.rejects(session.deletePassword('€'), InvalidInputError);
    assert.equal(client.calls.length, 2);
    assert.equal(session.state, SessionState.Authenticated);
  });

  void it('keeps the session when deleting the user fails', async () => {
    const client = new ScriptedExchanger([
      reply([['Session', 'S1']], keys.encrypt(Buffer.from('abcdefgh', 'latin1'))),
      reply([['Session', 'S1']], 'Success'),
      reply([['Session', 'S1']], 'Failed - server database error'),
    ]);
    const session = new AuthenticatedSession(client, { keys });
    await session.login('alice');

    await session.deleteUser();

    assert.equal(session.state, SessionState.Authenticated);
    assert.equal(session.sessionToken, 'S1');
  });
});

void describe('AuthenticatedSession key management', () => {
  let home: string;

  before(() => {
    home = createTestHome();
  });

  after(() => {
    removeTestHome(home);
  });

  void it('generates, writes and re-imports a key pair', async () => {
    const session = new AuthenticatedSession(new ScriptedExchanger([]), { keysDirectory: home });
    const previous = session.keyPair;

    const written = await session.generateKeys('public.der', 'private.der');

    assert.deepEqual(written, {
      publicKeyPath: path.join(home, 'public.der'),
      privateKeyPath: path.join(home, 'private.der'),
    });
    assert.notEqual(session.keyPair, previous);
    assert.ok(fs.readFileSync(written.publicKeyPath).equals(session.keyPair.exportPublicKey()));

    const other = new AuthenticatedSession(new ScriptedExchanger([]));
    await other.importKeys(written.publicKeyPath, written.privateKeyPath);
    assert.ok(other.keyPair.exportPublicKey().equals(session.keyPair.exportPublicKey()));
  });
});
