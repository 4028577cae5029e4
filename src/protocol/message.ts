/**
 * Wire message codec.
 *
 * Frame layout (integers little-endian, text one byte per character):
 *
 * ```
 * offset 0..3   "req" | "res"
 * offset 3      ':'
 * offset 4..8   int32 headerLength   (offset where the body starts)
 * offset 8      ':'
 * offset 9..H   (name '=' value ':')*
 * offset H..end body
 * ```
 *
 * There is no escaping: a header name or value containing `:` or `=` cannot be
 * represented. Encoding such a header produces a frame that `fromBytes` rejects.
 */

import { Direction, FRAME, HEADERS } from './constants.js';
import { FramingError } from './errors.js';

const COLON = 0x3a;
const EQUALS = 0x3d;
const TEXT_ENCODING: BufferEncoding = 'latin1';

export type HeaderEntries = Iterable<readonly [string, string]>;

/**
 * Immutable protocol message.
 */
export class Message {
  readonly direction: Direction;
  readonly headers: ReadonlyMap<string, string>;
  readonly body: Buffer;

  constructor(direction: Direction, headers: HeaderEntries = [], body: Uint8Array = Buffer.alloc(0)) {
    this.direction = direction;
    this.headers = new Map(headers);
    this.body = Buffer.from(body);
  }

  getHeader(name: string): string | undefined {
    return this.headers.get(name);
  }

  get method(): string | undefined {
    return this.getHeader(HEADERS.METHOD);
  }

  get session(): string | undefined {
    return this.getHeader(HEADERS.SESSION);
  }

  get contentType(): string | undefined {
    return this.getHeader(HEADERS.CONTENT_TYPE);
  }

  /**
   * Declared body length, or undefined when the header is absent or not a number.
   */
  get contentLength(): number | undefined {
    const raw = this.getHeader(HEADERS.CONTENT_LENGTH);
    if (raw === undefined || !/^[0-9]+$/.test(raw)) {
      return undefined;
    }
    return Number.parseInt(raw, 10);
  }

  /**
   * Body decoded as ASCII text.
   */
  bodyText(): string {
    return this.body.toString(TEXT_ENCODING);
  }

  /**
   * Header-for-header, body-for-body equality (header order included).
   */
  equals(other: Message): boolean {
    if (this.direction !== other.direction || this.headers.size !== other.headers.size) {
      return false;
    }
    const theirs = [...other.headers];
    const sameHeaders = [...this.headers].every(([name, value], index) => {
      const entry = theirs[index];
      return entry !== undefined && entry[0] === name && entry[1] === value;
    });
    return sameHeaders && this.body.equals(other.body);
  }

  /**
   * One-line rendering for debug logs. The body is summarized by size only.
   */
  describe(): string {
    const headerText = [...this.headers].map(([name, value]) => `${name}=${value}:`).join('');
    return `${this.direction}:${headerText} (${this.body.length}-byte body)`;
  }

  /**
   * Serialize to the wire layout.
   */
  toBytes(): Buffer {
    const entries = [...this.headers].map(([name, value]) => `${name}=${value}:`).join('');
    const headerBlock = Buffer.from(entries, TEXT_ENCODING);

    const preamble = Buffer.alloc(FRAME.PREAMBLE_LENGTH);
    preamble.write(this.direction, 0, FRAME.TAG_LENGTH, TEXT_ENCODING);
    preamble[FRAME.TAG_LENGTH] = COLON;
    preamble.writeInt32LE(FRAME.PREAMBLE_LENGTH + headerBlock.length, FRAME.LENGTH_OFFSET);
    preamble[FRAME.PREAMBLE_LENGTH - 1] = COLON;

    return Buffer.concat([preamble, headerBlock, this.body]);
  }

  /**
   * Parse one complete frame held in memory.
   *
   * Everything after the header block is the body; `Content-Length` is not
   * consulted here.
   *
   * @throws FramingError when the frame violates the layout
   */
  static fromBytes(bytes: Uint8Array): Message {
    const frame = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    if (frame.length < FRAME.PREAMBLE_LENGTH) {
      throw new FramingError(
        `Frame is ${frame.length} bytes, shorter than the ${FRAME.PREAMBLE_LENGTH}-byte preamble`
      );
    }

    const direction = parseDirection(frame.subarray(0, FRAME.TAG_LENGTH));
    const headerLength = readHeaderLength(frame.subarray(FRAME.TAG_LENGTH, FRAME.PREAMBLE_LENGTH));
    if (headerLength > frame.length) {
      throw new FramingError(
        `Header length ${headerLength} exceeds frame length ${frame.length}`
      );
    }

    const headers = parseHeaderBlock(frame, FRAME.PREAMBLE_LENGTH, headerLength);
    return new Message(direction, headers, frame.subarray(headerLength));
  }
}

/**
 * Validate a 3-byte direction tag.
 *
 * @throws FramingError for anything other than `req` or `res`
 */
export function parseDirection(tag: Buffer): Direction {
  const text = tag.toString(TEXT_ENCODING);
  if (text === Direction.Request) return Direction.Request;
  if (text === Direction.Response) return Direction.Response;
  throw new FramingError(`Frame does not start with "req" or "res" (got ${JSON.stringify(text)})`);
}

/**
 * Read the header length from the 6-byte `':' int32 ':'` span after the tag.
 *
 * @throws FramingError when a separator is missing or the length is below the preamble size
 */
export function readHeaderLength(span: Buffer): number {
  if (span.length !== FRAME.LENGTH_SPAN || span[0] !== COLON || span[FRAME.LENGTH_SPAN - 1] !== COLON) {
    throw new FramingError('Header length field is not enclosed in ":" separators');
  }
  const headerLength = span.readInt32LE(1);
  if (headerLength < FRAME.PREAMBLE_LENGTH) {
    throw new FramingError(
      `Header length ${headerLength} is smaller than the ${FRAME.PREAMBLE_LENGTH}-byte preamble`
    );
  }
  return headerLength;
}

/**
 * Split `name=value:` entries between `start` and `end` in one pass.
 */
function parseHeaderBlock(frame: Buffer, start: number, end: number): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  let entryStart = start;
  let equalsAt = -1;

  for (let offset = start; offset < end; offset++) {
    const byte = frame[offset];
    if (byte === EQUALS) {
      if (equalsAt !== -1) {
        throw new FramingError(
          `Second "=" at offset ${offset} in header entry starting at offset ${entryStart}`
        );
      }
      equalsAt = offset;
    } else if (byte === COLON) {
      if (equalsAt === -1) {
        throw new FramingError(`Header entry at offset ${entryStart} has no "="`);
      }
      entries.push([
        frame.toString(TEXT_ENCODING, entryStart, equalsAt),
        frame.toString(TEXT_ENCODING, equalsAt + 1, offset),
      ]);
      entryStart = offset + 1;
      equalsAt = -1;
    }
  }

  if (entryStart !== end) {
    throw new FramingError(`Header block ends inside an entry (entry starts at offset ${entryStart})`);
  }
  return entries;
}
