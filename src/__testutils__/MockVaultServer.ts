/**
 * In-process vault server for contract tests.
 *
 * Speaks the wire protocol over a real TCP (or TLS) socket on 127.0.0.1 and
 * implements the vault methods over an in-memory store, answering with the
 * same bodies the production server sends. Session tokens are issued in
 * sequence: S1, S2, ...
 */

import { constants, createPublicKey, publicEncrypt, randomBytes } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import * as net from 'node:net';
import * as tls from 'node:tls';

import { Direction, HEADERS, SESSION_TOKENS, SUCCESS_BODY } from '@/protocol/constants.js';
import type { ContentType } from '@/protocol/constants.js';
import { Message } from '@/protocol/message.js';
import { ExactReader } from '@/transport/ExactReader.js';
import { receiveFramedMessage } from '@/transport/framing.js';

/**
 * Behavior modes for testing different scenarios
 */
export type MockVaultMode =
  | 'normal' // Vault semantics
  | 'chunked' // Correct responses, written a few bytes at a time
  | 'silent' // Read the request, never answer
  | 'close_early' // Close the connection without answering
  | 'truncated' // Announce a longer body than is sent, then close
  | 'request_tag' // Answer with a "req" frame
  | 'garbage' // Answer with bytes that are not a frame
  | 'tampered_challenge'; // Corrupt the login challenge ciphertext

export interface MockVaultServerOptions {
  /** PEM key and certificate; serves TLS when given */
  tls?: { key: string; cert: string };
}

interface StoredUser {
  publicKey: KeyObject;
  publicKeyDer: Buffer;
  passwords: Map<string, Buffer>;
}

interface ServerSession {
  loginNumber?: Buffer;
  loginUserName?: string;
  userName?: string;
}

interface Reply {
  body: Buffer;
  contentType?: ContentType;
}

const CHUNK_SIZE = 3;
const LOGIN_NUMBER_BYTES = 8;

function ascii(text: string): Reply {
  return { body: Buffer.from(text, 'latin1'), contentType: 'ascii' };
}

function noBody(): Reply {
  return { body: Buffer.alloc(0) };
}

function parseJsonObject(body: Buffer): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(body.toString('latin1'));
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : null;
  } catch {
    return null;
  }
}

export class MockVaultServer {
  public mode: MockVaultMode = 'normal';

  /** Every request received, in arrival order */
  public readonly requests: Message[] = [];

  private server: net.Server | null = null;
  private readonly sockets = new Set<net.Socket>();
  private readonly users = new Map<string, StoredUser>();
  private readonly sessions = new Map<string, ServerSession>();
  private listeningPort = 0;
  private sessionCounter = 0;

  constructor(private readonly options: MockVaultServerOptions = {}) {}

  get port(): number {
    return this.listeningPort;
  }

  get userNames(): string[] {
    return [...this.users.keys()];
  }

  /**
   * Start listening on an ephemeral port.
   */
  async start(): Promise<number> {
    const onSocket = (socket: net.Socket): void => this.handleConnection(socket);
    const server = this.options.tls
      ? tls.createServer({ key: this.options.tls.key, cert: this.options.tls.cert }, onSocket)
      : net.createServer(onSocket);
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(0, '127.0.0.1', () => {
        server.removeListener('error', reject);
        resolve();
      });
    });

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Mock vault server has no TCP address');
    }
    this.listeningPort = address.port;
    return this.listeningPort;
  }

  /**
   * Drop all connections and stop listening.
   */
  async stop(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();
    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }

  /**
   * Seed a user directly, bypassing create_user.
   */
  addUser(userName: string, publicKeyDer: Buffer): void {
    this.users.set(userName, {
      publicKey: createPublicKey({ key: publicKeyDer, format: 'der', type: 'pkcs1' }),
      publicKeyDer,
      passwords: new Map(),
    });
  }

  /**
   * Random number most recently encrypted into a challenge for `token`.
   */
  loginNumber(token: string): Buffer | undefined {
    return this.sessions.get(token)?.loginNumber;
  }

  storedPassword(userName: string, source: string): Buffer | undefined {
    return this.users.get(userName)?.passwords.get(source);
  }

  // ==========================================================================
  // Connection handling
  // ==========================================================================

  private handleConnection(socket: net.Socket): void {
    this.sockets.add(socket);
    socket.on('close', () => this.sockets.delete(socket));
    socket.on('error', () => {
      // Client went away; nothing to clean up beyond the close handler
    });

    const reader = new ExactReader(socket);
    void receiveFramedMessage(reader).then(
      (request) => this.answer(socket, request),
      () => socket.destroy()
    );
  }

  private answer(socket: net.Socket, request: Message): void {
    this.requests.push(request);

    switch (this.mode) {
      case 'silent':
        return;
      case 'close_early':
        socket.destroy();
        return;
      case 'garbage':
        socket.end(Buffer.from('HTTP/1.1 400 Bad Request\r\n\r\n', 'latin1'));
        return;
      case 'truncated':
        socket.end(
          new Message(
            Direction.Response,
            [
              [HEADERS.SESSION, SESSION_TOKENS.NONE],
              [HEADERS.CONTENT_LENGTH, '100'],
            ],
            Buffer.from('partial', 'latin1')
          ).toBytes()
        );
        return;
      case 'request_tag': {
        const response = this.respond(request);
        socket.end(new Message(Direction.Request, response.headers, response.body).toBytes());
        return;
      }
      case 'chunked':
        this.writeChunked(socket, this.respond(request).toBytes());
        return;
      case 'normal':
      case 'tampered_challenge':
        socket.end(this.respond(request).toBytes());
        return;
    }
  }

  private writeChunked(socket: net.Socket, frame: Buffer): void {
    let offset = 0;
    const writeNext = (): void => {
      if (socket.destroyed) return;
      if (offset >= frame.length) {
        socket.end();
        return;
      }
      socket.write(frame.subarray(offset, offset + CHUNK_SIZE));
      offset += CHUNK_SIZE;
      setTimeout(writeNext, 1);
    };
    writeNext();
  }

  // ==========================================================================
  // Vault semantics
  // ==========================================================================

  private respond(request: Message): Message {
    const method = request.method ?? '';
    let token = request.session ?? SESSION_TOKENS.NONE;
    if (token === SESSION_TOKENS.REQUEST) {
      token = `S${++this.sessionCounter}`;
      this.sessions.set(token, {});
    }
    const session = token === SESSION_TOKENS.NONE ? undefined : this.sessions.get(token);

    const reply = this.dispatch(method, request.body, session);
    const headers: Array<[string, string]> = [
      [HEADERS.SESSION, token],
      [HEADERS.METHOD, method],
    ];
    if (reply.contentType !== undefined) {
      headers.push([HEADERS.CONTENT_TYPE, reply.contentType]);
    }
    headers.push([HEADERS.CONTENT_LENGTH, String(reply.body.length)]);
    return new Message(Direction.Response, headers, reply.body);
  }

  private dispatch(method: string, body: Buffer, session: ServerSession | undefined): Reply {
    switch (method) {
      case 'create_user':
        return this.createUser(body);
      case 'login_request':
        return this.loginRequest(body, session);
      case 'login_test':
        return this.loginTest(body, session);
      case 'get_sources':
        return this.getSources(session);
      case 'get_password':
        return this.getPassword(body, session);
      case 'set_password':
        return this.setPassword(body, session);
      case 'delete_password':
        return this.deletePassword(body, session);
      case 'delete_user':
        return this.deleteUser(session);
      default:
        return ascii(`Failed - unknown method ${method}`);
    }
  }

  private loggedInUser(session: ServerSession | undefined): StoredUser | string {
    if (!session) return 'Failed - no session';
    const user = session.userName === undefined ? undefined : this.users.get(session.userName);
    return user ?? 'Failed - not logged in';
  }

  private createUser(body: Buffer): Reply {
    const json = parseJsonObject(body);
    const userName = json?.['userName'];
    const publicKey = json?.['publicKey'];
    if (typeof userName !== 'string' || typeof publicKey !== 'string') {
      return ascii('Failed - malformed request');
    }
    const publicKeyDer = Buffer.from(publicKey, 'base64');
    if (this.users.has(userName)) {
      return ascii('User with this username already exists, choose a different username');
    }
    if ([...this.users.values()].some((user) => user.publicKeyDer.equals(publicKeyDer))) {
      return ascii('User with this public key already exists, choose a different public key');
    }
    this.addUser(userName, publicKeyDer);
    return ascii(SUCCESS_BODY);
  }

  private loginRequest(body: Buffer, session: ServerSession | undefined): Reply {
    const userName = body.toString('latin1');
    const user = this.users.get(userName);
    if (!session || !user) {
      return noBody();
    }
    const loginNumber = randomBytes(LOGIN_NUMBER_BYTES);
    session.loginNumber = loginNumber;
    session.loginUserName = userName;

    const challenge = publicEncrypt(
      { key: user.publicKey, padding: constants.RSA_PKCS1_PADDING },
      loginNumber
    );
    if (this.mode === 'tampered_challenge') {
      challenge.writeUInt8(challenge.readUInt8(0) ^ 0xff, 0);
    }
    return { body: challenge, contentType: 'bytes' };
  }

  private loginTest(body: Buffer, session: ServerSession | undefined): Reply {
    if (!session) return ascii('Failed - no session');
    if (!session.loginNumber) return ascii('Failed - no login number in session');
    if (session.loginUserName === undefined) return ascii('Failed - no login username in session');
    if (!body.equals(session.loginNumber)) return ascii('Failed - incorrect number');
    if (!this.users.has(session.loginUserName)) {
      return ascii(`Failed - user ${session.loginUserName} doesn't exist`);
    }
    session.userName = session.loginUserName;
    return ascii(SUCCESS_BODY);
  }

  private getSources(session: ServerSession | undefined): Reply {
    const user = this.loggedInUser(session);
    if (typeof user === 'string') return noBody();
    return {
      body: Buffer.from(JSON.stringify([...user.passwords.keys()]), 'latin1'),
      contentType: 'json',
    };
  }

  private getPassword(body: Buffer, session: ServerSession | undefined): Reply {
    const user = this.loggedInUser(session);
    if (typeof user === 'string') return noBody();
    const password = user.passwords.get(body.toString('latin1'));
    return password ? { body: password, contentType: 'bytes' } : noBody();
  }

  private setPassword(body: Buffer, session: ServerSession | undefined): Reply {
    const user = this.loggedInUser(session);
    if (typeof user === 'string') return ascii(user);
    const json = parseJsonObject(body);
    const source = json?.['source'];
    const password = json?.['password'];
    if (typeof source !== 'string' || typeof password !== 'string') {
      return ascii('Failed - malformed request');
    }
    if (user.passwords.has(source)) {
      return ascii('Failed - password for source already exists');
    }
    user.passwords.set(source, Buffer.from(password, 'base64'));
    return ascii(SUCCESS_BODY);
  }

  private deletePassword(body: Buffer, session: ServerSession | undefined): Reply {
    const user = this.loggedInUser(session);
    if (typeof user === 'string') return ascii(user);
    if (!user.passwords.delete(body.toString('latin1'))) {
      return ascii("Failed - password for source doesn't exist");
    }
    return ascii(SUCCESS_BODY);
  }

  private deleteUser(session: ServerSession | undefined): Reply {
    const user = this.loggedInUser(session);
    if (typeof user === 'string') return ascii(user);
    this.users.forEach((stored, name) => {
      if (stored === user) this.users.delete(name);
    });
    if (session) delete session.userName;
    return ascii(SUCCESS_BODY);
  }
}
