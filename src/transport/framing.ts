/**
 * Frame reassembly from a byte stream.
 *
 * Frames carry no whole-message length prefix. The receiver reads the fixed
 * preamble, then the header block it announces, then as many body bytes as the
 * `Content-Length` header declares.
 */

import { FRAME, HEADERS } from '@/protocol/constants.js';
import { FramingError } from '@/protocol/errors.js';
import { Message, parseDirection, readHeaderLength } from '@/protocol/message.js';

import type { ExactReader } from './ExactReader.js';

const CONTENT_LENGTH_PATTERN = new RegExp(`(?:^|:)${HEADERS.CONTENT_LENGTH}=([0-9]+):`);

/**
 * Find the declared body length in a raw header block.
 *
 * @throws FramingError when the header is missing
 */
export function findContentLength(headerBlock: Buffer): number {
  const match = CONTENT_LENGTH_PATTERN.exec(headerBlock.toString('latin1'));
  const digits = match?.[1];
  if (digits === undefined) {
    throw new FramingError(`Header block has no ${HEADERS.CONTENT_LENGTH} entry`);
  }
  return Number.parseInt(digits, 10);
}

/**
 * Read one complete frame from `reader` and decode it.
 *
 * @throws FramingError on a malformed frame or a stream that ends mid-frame
 */
export async function receiveFramedMessage(reader: ExactReader): Promise<Message> {
  const tag = await reader.read(FRAME.TAG_LENGTH);
  parseDirection(tag);

  const lengthSpan = await reader.read(FRAME.LENGTH_SPAN);
  const headerLength = readHeaderLength(lengthSpan);
  if (headerLength > FRAME.MAX_HEADER_LENGTH) {
    throw new FramingError(
      `Header length ${headerLength} exceeds the ${FRAME.MAX_HEADER_LENGTH}-byte limit`
    );
  }

  const headerBlock = await reader.read(headerLength - FRAME.PREAMBLE_LENGTH);
  const contentLength = findContentLength(headerBlock);
  if (contentLength > FRAME.MAX_BODY_LENGTH) {
    throw new FramingError(
      `Content-Length ${contentLength} exceeds the ${FRAME.MAX_BODY_LENGTH}-byte limit`
    );
  }

  const body = await reader.read(contentLength);
  return Message.fromBytes(Buffer.concat([tag, lengthSpan, headerBlock, body]));
}
