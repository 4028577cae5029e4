/**
 * Wire protocol constants shared by the codec, the transport and the vault session.
 */

/**
 * Frame direction tag, encoded as exactly three ASCII bytes.
 */
export enum Direction {
  Request = 'req',
  Response = 'res',
}

/**
 * Header names the server understands.
 */
export const HEADERS = {
  METHOD: 'Method',
  SESSION: 'Session',
  CONTENT_TYPE: 'Content-Type',
  CONTENT_LENGTH: 'Content-Length',
} as const;

/**
 * Methods served by the vault.
 */
export const METHODS = [
  'create_user',
  'login_request',
  'login_test',
  'get_sources',
  'get_password',
  'set_password',
  'delete_password',
  'delete_user',
] as const;

export type VaultMethod = (typeof METHODS)[number];

/**
 * Content-Type values sent by the client.
 */
export type ContentType = 'json' | 'ascii' | 'bytes';

/**
 * Reserved session tokens.
 */
export const SESSION_TOKENS = {
  /** No session (create_user) */
  NONE: '-',
  /** Ask the server to open a new session (login_request) */
  REQUEST: '*',
} as const;

/**
 * Frame layout and limits.
 */
export const FRAME = {
  /** Length of the direction tag */
  TAG_LENGTH: 3,
  /** `':' + int32 + ':'` following the tag */
  LENGTH_SPAN: 6,
  /** Offset of the int32 header length */
  LENGTH_OFFSET: 4,
  /** Offset of the first header entry; smallest legal header length */
  PREAMBLE_LENGTH: 9,
  /** Largest header block accepted from the network */
  MAX_HEADER_LENGTH: 64 * 1024,
  /** Largest body accepted from the network */
  MAX_BODY_LENGTH: 16 * 1024 * 1024,
} as const;

/**
 * Literal body the server returns when an operation succeeds.
 */
export const SUCCESS_BODY = 'Success';
