/**
 * Error handling utilities.
 *
 * Pure helpers for pulling information out of values of unknown type.
 */

/**
 * Extract error message from unknown error type.
 *
 * @example
 * ```typescript
 * try {
 *   await session.getSources();
 * } catch (error) {
 *   console.error(`Failed: ${getErrorMessage(error)}`);
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Extract the errno-style `code` property Node attaches to system and TLS errors.
 *
 * @returns The code, or undefined when the value carries none
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
}
