/**
 * Interpretation of server response bodies.
 *
 * The session layer returns responses untouched; these helpers are for callers
 * that want the server's verdict. A failure body is a returned value, not an
 * error: the exchange itself worked.
 */

import { SUCCESS_BODY } from '@/protocol/constants.js';
import { FramingError } from '@/protocol/errors.js';
import type { Message } from '@/protocol/message.js';

export type VaultReply = { ok: true } | { ok: false; reason: string };

/**
 * `Success` means success; any other body is the server's failure text.
 */
export function interpretReply(message: Message): VaultReply {
  const text = message.bodyText();
  if (text === SUCCESS_BODY) {
    return { ok: true };
  }
  return { ok: false, reason: text.length > 0 ? text : 'server returned no body' };
}

/**
 * Parse a `get_sources` body. An empty body (not logged in, server error) yields `[]`.
 *
 * @throws FramingError when the body is not a JSON array of strings
 */
export function parseSources(message: Message): string[] {
  const text = message.bodyText();
  if (text.length === 0) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new FramingError('get_sources body is not valid JSON', error);
  }
  if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === 'string')) {
    throw new FramingError('get_sources body is not a JSON array of strings');
  }
  return parsed;
}
