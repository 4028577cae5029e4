import { VERSION } from '@/utils/version.js';

/**
 * JSON envelopes for `--json` output.
 */
export class OutputBuilder {
  /**
   * Build a JSON error response.
   *
   * @param error - Error message or Error object
   * @param options - Extra fields (exitCode, suggestion, ...)
   */
  static buildJsonError(
    error: string | Error,
    options?: { exitCode?: number; [key: string]: unknown }
  ): Record<string, unknown> {
    return {
      version: VERSION,
      success: false,
      error: error instanceof Error ? error.message : error,
      ...options,
    };
  }

  static buildJsonSuccess(data: object): Record<string, unknown> {
    return {
      version: VERSION,
      success: true,
      ...data,
    };
  }
}
