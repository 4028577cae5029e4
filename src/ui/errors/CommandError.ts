/**
 * Structured error handling for CLI commands.
 *
 * Provides CommandError class for throwing errors with metadata and exit codes.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Metadata that can be attached to command errors.
 */
export interface ErrorMetadata {
  /** User-facing suggestion for resolving the error */
  suggestion?: string;
  /** Technical note or additional context */
  note?: string;
}

/**
 * Error raised by a command handler, with a user-facing suggestion and the
 * exit code the process should end with.
 *
 * @example
 * ```typescript
 * throw new CommandError(
 *   'Key files already exist',
 *   { suggestion: 'Overwrite them with: pwvault keygen --force' },
 *   EXIT_CODES.RESOURCE_ALREADY_EXISTS
 * );
 * ```
 */
export class CommandError extends Error {
  public readonly metadata: ErrorMetadata;
  public readonly exitCode: number;

  constructor(
    message: string,
    metadata: ErrorMetadata = {},
    exitCode: number = EXIT_CODES.GENERIC_FAILURE
  ) {
    super(message);
    this.name = 'CommandError';
    this.metadata = metadata;
    this.exitCode = exitCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CommandError);
    }
  }
}
