/**
 * Request/response client for the vault protocol.
 *
 * Each `exchange` opens its own connection, sends one request frame, reads one
 * response frame and closes the connection. Independent exchanges may run
 * concurrently; nothing is shared between them.
 */

import { Direction, HEADERS } from '@/protocol/constants.js';
import type { ContentType, VaultMethod } from '@/protocol/constants.js';
import { FramingError } from '@/protocol/errors.js';
import { Message } from '@/protocol/message.js';
import { withTransport } from '@/transport/Transport.js';
import type { TransportOptions } from '@/transport/Transport.js';
import { createLogger } from '@/ui/logging/index.js';

const log = createLogger('client');

export type ProtocolClientOptions = TransportOptions;

/**
 * Anything that can run one request/response exchange.
 *
 * `AuthenticatedSession` depends on this seam rather than on the socket client.
 */
export interface Exchanger {
  exchange(
    method: VaultMethod,
    body: Uint8Array | string,
    session: string,
    contentType?: ContentType
  ): Promise<Message>;
}

/**
 * Build the request frame for one exchange.
 *
 * Header order: Method, Session, Content-Type (when given), Content-Length.
 */
export function buildRequest(
  method: VaultMethod,
  body: Uint8Array | string,
  session: string,
  contentType?: ContentType
): Message {
  const bodyBytes = typeof body === 'string' ? Buffer.from(body, 'latin1') : Buffer.from(body);
  const headers: Array<[string, string]> = [
    [HEADERS.METHOD, method],
    [HEADERS.SESSION, session],
  ];
  if (contentType !== undefined) {
    headers.push([HEADERS.CONTENT_TYPE, contentType]);
  }
  headers.push([HEADERS.CONTENT_LENGTH, String(bodyBytes.length)]);
  return new Message(Direction.Request, headers, bodyBytes);
}

/**
 * Socket-backed `Exchanger`; plain or TLS according to `options.tls`.
 */
export class ProtocolClient implements Exchanger {
  private readonly options: ProtocolClientOptions;

  constructor(options: ProtocolClientOptions) {
    this.options = options;
  }

  get endpoint(): string {
    return `${this.options.host}:${this.options.port}`;
  }

  get encrypted(): boolean {
    return this.options.tls;
  }

  /**
   * Send one request and return the parsed response.
   *
   * @throws ConnectionRefusedError, ConnectionTimedOutError, CertificateError,
   *   UnknownTransportError or FramingError
   */
  async exchange(
    method: VaultMethod,
    body: Uint8Array | string,
    session: string,
    contentType?: ContentType
  ): Promise<Message> {
    const request = buildRequest(method, body, session, contentType);
    log.debug(`${method} -> ${this.endpoint} (${request.body.length}-byte body)`);

    const response = await withTransport(this.options, async (transport) => {
      await transport.send(request.toBytes());
      return transport.receiveFramedMessage();
    });

    if (response.direction !== Direction.Response) {
      throw new FramingError(`Expected a "res" frame for ${method}, got "${response.direction}"`);
    }
    log.debug(`${method} <- ${response.body.length}-byte body`);
    return response;
  }
}
