/**
 * Error handling for the pwvault CLI.
 */

// CLI-level errors (user-facing command errors)
export { CommandError } from './CommandError.js';
export type { ErrorMetadata } from './CommandError.js';

// Errors raised by the vault client core
export { VaultError } from '@/protocol/errors.js';
export { getErrorMessage } from '@/utils/errors.js';
