/**
 * Library entry point.
 */

export { ProtocolClient, buildRequest } from './client/ProtocolClient.js';
export type { Exchanger, ProtocolClientOptions } from './client/ProtocolClient.js';
export {
  ConfigError,
  buildVerifier,
  keyPaths,
  loadConfig,
  toClientOptions,
} from './config/config.js';
export type { ConfigOverrides, LoadConfigOptions, VaultConfig } from './config/config.js';
export { getConfigDir } from './config/paths.js';
export {
  Direction,
  HEADERS,
  METHODS,
  SESSION_TOKENS,
  SUCCESS_BODY,
} from './protocol/constants.js';
export type { ContentType, VaultMethod } from './protocol/constants.js';
export {
  CertificateError,
  ConnectionRefusedError,
  ConnectionTimedOutError,
  CryptoError,
  FramingError,
  InvalidInputError,
  SessionStateError,
  TransportError,
  UnknownTransportError,
  VaultError,
} from './protocol/errors.js';
export { Message } from './protocol/message.js';
export { Transport, withTransport } from './transport/Transport.js';
export type { TransportOptions } from './transport/Transport.js';
export {
  PinnedCertificateVerifier,
  SystemTrustVerifier,
  normalizeFingerprint,
} from './transport/verification.js';
export type { CertificateVerifier } from './transport/verification.js';
export { AuthenticatedSession, SessionState } from './vault/AuthenticatedSession.js';
export type { AuthenticatedSessionOptions } from './vault/AuthenticatedSession.js';
export { RsaKeyPair } from './vault/keys.js';
export type { KeyMaterial } from './vault/keys.js';
export { interpretReply, parseSources } from './vault/replies.js';
export type { VaultReply } from './vault/replies.js';
