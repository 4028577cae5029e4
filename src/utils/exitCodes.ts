/**
 * Semantic exit codes for the pwvault CLI.
 *
 * Exit codes follow semantic ranges so scripts can branch on them:
 * - **0**: Success
 * - **1**: Generic failure
 * - **80-99**: User errors (invalid input, missing resources, wrong session state)
 * - **100-119**: Software and integration errors (network, framing, crypto)
 *
 * Values are stable: new codes may be added inside the existing ranges, existing
 * codes keep their meaning.
 */

/**
 * Exit code constants following semantic ranges.
 */
export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** Generic failure (use specific codes when possible) */
  GENERIC_FAILURE: 1,

  // User Errors (80-99)

  /** Invalid command-line arguments, options or configuration values */
  INVALID_ARGUMENTS: 81,

  /** The server refused the login (unknown user, or a key pair it did not register) */
  PERMISSION_DENIED: 82,

  /** Requested resource not found (key file, config file) */
  RESOURCE_NOT_FOUND: 83,

  /** Resource already exists (key pair on keygen without --force) */
  RESOURCE_ALREADY_EXISTS: 84,

  /** The server answered with a failure body (login rejected, unknown source) */
  VAULT_REJECTED: 86,

  /** Operation not allowed in the current session state */
  SESSION_STATE: 87,

  // Software Errors (100-119)

  /** Connection to the vault server failed */
  CONNECTION_FAILURE: 101,

  /** Vault server did not answer in time */
  CONNECTION_TIMEOUT: 102,

  /** Unhandled exception in code */
  UNHANDLED_EXCEPTION: 104,

  /** TLS peer identity was rejected */
  CERTIFICATE_REJECTED: 106,

  /** Received frame violates the wire format */
  FRAMING_ERROR: 107,

  /** Key import/export, encryption or decryption failed */
  CRYPTO_ERROR: 108,

  /** Generic software error (use specific codes when possible) */
  SOFTWARE_ERROR: 110,
} as const;
