/**
 * Centralized defaults for the vault client.
 *
 * Timing, endpoint and file-name values used across the transport, the key
 * store and the configuration loader.
 */

// ============================================================================
// CONNECTION
// ============================================================================

/**
 * Default vault server address
 */
export const DEFAULT_HOST = '127.0.0.1';

/**
 * Default vault server port
 */
export const DEFAULT_PORT = 8820;

/**
 * TLS is on unless configuration turns it off
 */
export const DEFAULT_TLS = true;

/**
 * Idle timeout for connecting and reading a response (120 seconds)
 */
export const DEFAULT_TIMEOUT_MS = 120_000;

// ============================================================================
// FILES
// ============================================================================

/**
 * Client directory under the user's home (overridable with PWVAULT_HOME)
 */
export const CONFIG_DIR_NAME = '.pwvault';

/**
 * Config file inside the client directory
 */
export const CONFIG_FILE_NAME = 'config.json';

/**
 * Key directory inside the client directory
 */
export const KEYS_DIR_NAME = 'keys';

/**
 * Key file names (PKCS#1 DER)
 */
export const DEFAULT_PUBLIC_KEY_FILE = 'public.der';
export const DEFAULT_PRIVATE_KEY_FILE = 'private.der';

// ============================================================================
// CRYPTO
// ============================================================================

/**
 * RSA modulus length for generated key pairs
 */
export const RSA_MODULUS_BITS = 2048;
