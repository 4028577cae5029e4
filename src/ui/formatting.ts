/**
 * Shared formatting helpers for UI output.
 */

/**
 * Join lines with newlines, dropping `undefined`, `null` and `false` entries so
 * optional lines can be written inline with `&&`.
 */
export function joinLines(...lines: Array<string | null | undefined | false>): string {
  return lines
    .filter((line): line is string => line !== undefined && line !== null && line !== false)
    .join('\n');
}
