/**
 * Vault session: key pair, login handshake and password operations.
 *
 * Login is a two-step challenge-response:
 * 1. `login_request` with the user name; the server opens a session and
 *    returns a random number encrypted under the user's registered public key.
 * 2. `login_test` with the decrypted number; the server answers `Success` and
 *    the session token becomes valid for the vault operations.
 *
 * Passwords are encrypted (as UTF-8) with the public key before they leave the
 * process and come back encrypted; only `decryptPassword` recovers plaintext.
 * User names and sources go out as ASCII text and must be printable ASCII.
 */

import * as path from 'node:path';

import type { Exchanger } from '@/client/ProtocolClient.js';
import { SESSION_TOKENS, SUCCESS_BODY } from '@/protocol/constants.js';
import { FramingError, InvalidInputError, SessionStateError } from '@/protocol/errors.js';
import type { Message } from '@/protocol/message.js';
import { createLogger } from '@/ui/logging/index.js';
import { SerialQueue } from '@/utils/concurrency.js';

import { RsaKeyPair } from './keys.js';

const log = createLogger('session');

const PRINTABLE_ASCII = /^[\x20-\x7e]*$/;

/**
 * @throws InvalidInputError when `value` is not printable ASCII
 */
function requireAscii(field: 'user name' | 'source', value: string): string {
  if (!PRINTABLE_ASCII.test(value)) {
    throw new InvalidInputError(`The ${field} ${JSON.stringify(value)} must be printable ASCII`);
  }
  return value;
}

export enum SessionState {
  Anonymous = 'anonymous',
  AwaitingChallenge = 'awaiting_challenge',
  Authenticated = 'authenticated',
}

export interface AuthenticatedSessionOptions {
  /** Key pair to start with (default: a freshly generated one) */
  keys?: RsaKeyPair;
  /** Directory `generateKeys` writes into */
  keysDirectory?: string;
}

/**
 * One user's logical session with the vault.
 *
 * Operations run one at a time; calling several concurrently queues them.
 */
export class AuthenticatedSession {
  private keys: RsaKeyPair;
  private readonly keysDirectory: string;
  private readonly queue = new SerialQueue();
  private currentState: SessionState = SessionState.Anonymous;
  private token: string | null = null;
  private pendingToken: string | null = null;

  constructor(
    private readonly client: Exchanger,
    options: AuthenticatedSessionOptions = {}
  ) {
    this.keys = options.keys ?? RsaKeyPair.generate();
    this.keysDirectory = options.keysDirectory ?? 'keys';
  }

  get state(): SessionState {
    return this.currentState;
  }

  /**
   * Active session token while Authenticated, otherwise null.
   */
  get sessionToken(): string | null {
    return this.currentState === SessionState.Authenticated ? this.token : null;
  }

  /**
   * Token issued by the last successful `loginRequest`, until the login completes or fails.
   */
  get challengeToken(): string | null {
    return this.pendingToken;
  }

  get keyPair(): RsaKeyPair {
    return this.keys;
  }

  // ==========================================================================
  // Key management
  // ==========================================================================

  /**
   * Replace the key pair with a new one and write it under the key directory.
   *
   * @returns Paths of the written public and private key files
   */
  generateKeys(
    publicKeyFileName: string,
    privateKeyFileName: string
  ): Promise<{ publicKeyPath: string; privateKeyPath: string }> {
    return this.queue.run(async () => {
      const keys = RsaKeyPair.generate();
      const publicKeyPath = path.join(this.keysDirectory, publicKeyFileName);
      const privateKeyPath = path.join(this.keysDirectory, privateKeyFileName);
      await keys.save(publicKeyPath, privateKeyPath);
      this.keys = keys;
      return { publicKeyPath, privateKeyPath };
    });
  }

  /**
   * Replace the key pair with one loaded from disk.
   */
  importKeys(publicKeyPath: string, privateKeyPath: string): Promise<void> {
    return this.queue.run(async () => {
      this.keys = await RsaKeyPair.load(publicKeyPath, privateKeyPath);
    });
  }

  // ==========================================================================
  // Account
  // ==========================================================================

  /**
   * Register `userName` with the current public key. Does not change state.
   */
  createUser(userName: string): Promise<Message> {
    return this.queue.run(() => {
      const body = JSON.stringify({
        userName: requireAscii('user name', userName),
        publicKey: this.keys.exportPublicKey().toString('base64'),
      });
      return this.client.exchange('create_user', body, SESSION_TOKENS.NONE, 'json');
    });
  }

  /**
   * Delete the logged-in user. A `Success` reply ends the session.
   */
  deleteUser(): Promise<Message> {
    return this.queue.run(async () => {
      const response = await this.client.exchange('delete_user', '', this.requireToken('delete_user'));
      if (response.bodyText() === SUCCESS_BODY) {
        this.reset();
      }
      return response;
    });
  }

  // ==========================================================================
  // Login
  // ==========================================================================

  /**
   * Ask for a login challenge.
   *
   * A non-empty body moves the session to AwaitingChallenge; an empty body
   * (unknown user, server error) returns it to Anonymous.
   *
   * @throws FramingError when a challenge arrives without a Session header
   */
  loginRequest(userName: string): Promise<Message> {
    return this.queue.run(async () => {
      requireAscii('user name', userName);
      this.reset();
      const response = await this.client.exchange(
        'login_request',
        userName,
        SESSION_TOKENS.REQUEST,
        'ascii'
      );

      if (response.body.length === 0) {
        log.debug(`login_request for ${userName} returned no challenge`);
        return response;
      }

      const token = response.session;
      if (!token || token === SESSION_TOKENS.REQUEST) {
        throw new FramingError('login_request response carries a challenge but no Session header');
      }
      this.pendingToken = token;
      this.currentState = SessionState.AwaitingChallenge;
      log.debug(`Challenge received (${response.body.length} bytes)`);
      return response;
    });
  }

  /**
   * Answer the challenge with its decryption under the private key.
   *
   * A `Success` reply moves the session to Authenticated with `session` as the
   * active token; anything else, or a decryption failure, returns it to Anonymous.
   *
   * @throws CryptoError when the challenge cannot be decrypted
   */
  loginTest(challenge: Uint8Array, session: string): Promise<Message> {
    return this.queue.run(async () => {
      try {
        const answer = this.keys.decrypt(challenge);
        const response = await this.client.exchange('login_test', answer, session, 'bytes');

        if (response.bodyText() === SUCCESS_BODY) {
          this.token = session;
          this.pendingToken = null;
          this.currentState = SessionState.Authenticated;
          log.debug('Login accepted');
        } else {
          log.debug('Login rejected by server');
          this.reset();
        }
        return response;
      } catch (error) {
        this.reset();
        throw error;
      }
    });
  }

  /**
   * Run the whole handshake.
   *
   * @returns True once Authenticated, false when the server refused either step
   */
  async login(userName: string): Promise<boolean> {
    const challenge = await this.loginRequest(userName);
    const token = this.pendingToken;
    if (token === null) {
      return false;
    }
    const verdict = await this.loginTest(challenge.body, token);
    return verdict.bodyText() === SUCCESS_BODY;
  }

  /**
   * Forget the session token locally. The server lets it expire on its own.
   */
  logout(): void {
    this.reset();
  }

  // ==========================================================================
  // Passwords
  // ==========================================================================

  /**
   * List stored sources; the body is a JSON array when non-empty.
   */
  getSources(): Promise<Message> {
    return this.queue.run(() =>
      this.client.exchange('get_sources', '', this.requireToken('get_sources'))
    );
  }

  /**
   * Fetch the encrypted password for `source`; see `decryptPassword`.
   */
  getPassword(source: string): Promise<Message> {
    return this.queue.run(() =>
      this.client.exchange(
        'get_password',
        requireAscii('source', source),
        this.requireToken('get_password'),
        'ascii'
      )
    );
  }

  /**
   * Store `password` for `source`, encrypted under the public key.
   *
   * @throws CryptoError when the UTF-8 password does not fit one RSA block
   */
  setPassword(source: string, password: string): Promise<Message> {
    return this.queue.run(() => {
      const token = this.requireToken('set_password');
      requireAscii('source', source);
      const encrypted = this.keys.encrypt(Buffer.from(password, 'utf8'));
      const body = JSON.stringify({ source, password: encrypted.toString('base64') });
      return this.client.exchange('set_password', body, token, 'json');
    });
  }

  deletePassword(source: string): Promise<Message> {
    return this.queue.run(() =>
      this.client.exchange(
        'delete_password',
        requireAscii('source', source),
        this.requireToken('delete_password'),
        'ascii'
      )
    );
  }

  /**
   * Decrypt a password returned by `getPassword`.
   *
   * @throws CryptoError when the ciphertext does not belong to this key pair
   */
  decryptPassword(ciphertext: Uint8Array): string {
    return this.keys.decrypt(ciphertext).toString('utf8');
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private requireToken(method: string): string {
    if (this.currentState !== SessionState.Authenticated || this.token === null) {
      throw new SessionStateError(`${method} requires a logged-in session (state: ${this.currentState})`);
    }
    return this.token;
  }

  private reset(): void {
    this.currentState = SessionState.Anonymous;
    this.token = null;
    this.pendingToken = null;
  }
}

