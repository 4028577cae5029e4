/**
 * Connection to the vault server.
 *
 * One `Transport` owns one TCP or TLS socket for exactly one exchange. There is
 * no pooling or keep-alive: callers go through `withTransport`, which releases
 * the socket on every exit path.
 */

import { connect as connectPlain, isIP } from 'node:net';
import type { Socket } from 'node:net';
import { connect as connectTls } from 'node:tls';

import { DEFAULT_TIMEOUT_MS } from '@/constants.js';
import { UnknownTransportError } from '@/protocol/errors.js';
import type { CertificateError, VaultError } from '@/protocol/errors.js';
import type { Message } from '@/protocol/message.js';
import { createLogger } from '@/ui/logging/index.js';

import { ExactReader } from './ExactReader.js';
import { classifyTransportError, formatTimeoutError } from './errors.js';
import type { TransportErrorContext } from './errors.js';
import { receiveFramedMessage } from './framing.js';
import { SystemTrustVerifier } from './verification.js';
import type { CertificateVerifier } from './verification.js';

const log = createLogger('transport');

export interface TransportOptions {
  host: string;
  port: number;
  /** Wrap the connection in TLS */
  tls: boolean;
  /** Idle timeout for connecting and reading, in milliseconds (default 120s) */
  timeoutMs?: number;
  /** TLS peer verification strategy (default: system trust store) */
  verifier?: CertificateVerifier;
  /** Expected TLS server identity (default: host) */
  servername?: string;
}

interface PendingSocket {
  socket: Socket;
  readyEvent: 'connect' | 'secureConnect';
  verifyPeer: () => CertificateError | null;
}

function createPlainSocket(options: TransportOptions): PendingSocket {
  const socket = connectPlain({ host: options.host, port: options.port });
  return { socket, readyEvent: 'connect', verifyPeer: () => null };
}

function createTlsSocket(options: TransportOptions): PendingSocket {
  const verifier = options.verifier ?? new SystemTrustVerifier();
  const servername = options.servername ?? options.host;
  log.debug(`TLS to ${options.host}:${options.port} verified by ${verifier.description}`);

  const socket = connectTls({
    host: options.host,
    port: options.port,
    // SNI must not carry an IP address; identity is then checked against host
    ...(isIP(servername) === 0 ? { servername } : {}),
    ...verifier.connectOptions(),
  });
  return { socket, readyEvent: 'secureConnect', verifyPeer: () => verifier.verify(socket) };
}

/**
 * A connected socket with exact-length framed reads.
 */
export class Transport {
  private readonly reader: ExactReader;
  private readonly context: TransportErrorContext;
  private closed = false;

  private constructor(
    private readonly socket: Socket,
    host: string,
    port: number,
    private readonly timeoutMs: number
  ) {
    this.context = { host, port, stage: 'send' };
    this.reader = new ExactReader(socket);

    socket.on('error', (error) => {
      this.reader.fail(classifyTransportError(error, this.context));
    });
    socket.on('timeout', () => {
      log.debug(`Idle for ${this.timeoutMs}ms during ${this.context.stage}, closing`);
      this.reader.fail(formatTimeoutError(this.context, this.timeoutMs));
      this.close();
    });
  }

  /**
   * Connect and, in TLS mode, complete the handshake and verify the peer.
   *
   * @throws ConnectionRefusedError, ConnectionTimedOutError, CertificateError or UnknownTransportError
   */
  static open(options: TransportOptions): Promise<Transport> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const context: TransportErrorContext = {
      host: options.host,
      port: options.port,
      stage: 'connect',
    };

    return new Promise<Transport>((resolve, reject) => {
      const { socket, readyEvent, verifyPeer } = options.tls
        ? createTlsSocket(options)
        : createPlainSocket(options);
      socket.setNoDelay(true);
      socket.setTimeout(timeoutMs);

      const detach = (): void => {
        socket.removeListener('error', onError);
        socket.removeListener('timeout', onTimeout);
        socket.removeListener(readyEvent, onReady);
      };

      const fail = (error: VaultError): void => {
        detach();
        socket.destroy();
        reject(error);
      };

      const onError = (error: Error): void => fail(classifyTransportError(error, context));
      const onTimeout = (): void => fail(formatTimeoutError(context, timeoutMs));
      const onReady = (): void => {
        const rejection = verifyPeer();
        if (rejection) {
          fail(rejection);
          return;
        }
        detach();
        log.debug(`Connected to ${options.host}:${options.port}${options.tls ? ' (TLS)' : ''}`);
        resolve(new Transport(socket, options.host, options.port, timeoutMs));
      };

      socket.once('error', onError);
      socket.once('timeout', onTimeout);
      socket.once(readyEvent, onReady);
    });
  }

  /**
   * Write the whole buffer; resolves once it has been flushed to the socket.
   */
  send(bytes: Uint8Array): Promise<void> {
    this.context.stage = 'send';
    if (this.closed) {
      return Promise.reject(new UnknownTransportError('Cannot send on a closed transport'));
    }

    return new Promise<void>((resolve, reject) => {
      this.socket.write(bytes, (error) => {
        if (error) {
          reject(classifyTransportError(error, this.context));
          return;
        }
        log.debug(`Sent ${bytes.length} bytes`);
        resolve();
      });
    });
  }

  /**
   * Read exactly one frame.
   *
   * @throws FramingError, ConnectionTimedOutError or a classified transport error
   */
  async receiveFramedMessage(): Promise<Message> {
    this.context.stage = 'receive';
    const message = await receiveFramedMessage(this.reader);
    log.debug(`Received ${message.describe()}`);
    return message;
  }

  /**
   * Destroy the socket. Safe to call more than once.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.socket.destroy();
  }
}

/**
 * Open a transport, run `fn` with it, and close it however `fn` finishes.
 */
export async function withTransport<T>(
  options: TransportOptions,
  fn: (transport: Transport) => Promise<T>
): Promise<T> {
  const transport = await Transport.open(options);
  try {
    return await fn(transport);
  } finally {
    transport.close();
  }
}
