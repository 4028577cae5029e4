import { OutputBuilder } from '@/ui/OutputBuilder.js';
import { CommandError, getErrorMessage, VaultError } from '@/ui/errors/index.js';
import { createLogger } from '@/ui/logging/index.js';
import { genericError, unknownError, vaultErrorSuggestion } from '@/ui/messages/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

const log = createLogger('pwvault');

/**
 * Standard options supported by CommandRunner.
 * All commands that use CommandRunner must extend this interface.
 */
export interface BaseCommandOptions {
  /** Output as JSON instead of human-readable format */
  json?: boolean;
}

/**
 * Result from a command handler.
 */
export type CommandResult<T> =
  | { success: true; data: T }
  | {
      success: false;
      error: string;
      suggestion?: string;
      /** Defaults to UNHANDLED_EXCEPTION */
      exitCode?: number;
    };

/**
 * Command logic, implemented as a function of the parsed options.
 */
export type CommandHandler<TOptions extends BaseCommandOptions, TResult> = (
  options: TOptions
) => Promise<CommandResult<TResult>>;

/**
 * Human-readable rendering of a successful result.
 */
export type CommandFormatter<TResult> = (data: TResult) => string;

function fail(
  options: BaseCommandOptions,
  message: string,
  exitCode: number,
  suggestion?: string
): never {
  if (options.json) {
    console.log(
      JSON.stringify(
        OutputBuilder.buildJsonError(message, {
          exitCode,
          ...(suggestion !== undefined ? { suggestion } : {}),
        }),
        null,
        2
      )
    );
  } else {
    console.error(message ? genericError(message) : unknownError());
    if (suggestion !== undefined) {
      console.error(suggestion);
    }
  }
  process.exit(exitCode);
}

/**
 * Run a command with consistent error handling, output formatting, and exit codes.
 *
 * This helper:
 * - Wraps command logic in try-catch
 * - Maps vault client errors to their semantic exit codes and hints
 * - Formats output as JSON or human-readable based on --json flag
 * - Calls process.exit() with the resulting exit code
 *
 * @example
 * ```typescript
 * await runCommand(
 *   async (opts) => {
 *     const sources = await listSources(opts);
 *     return { success: true, data: { sources } };
 *   },
 *   options,
 *   formatSources
 * );
 * ```
 */
export async function runCommand<TOptions extends BaseCommandOptions, TResult extends object>(
  handler: CommandHandler<TOptions, TResult>,
  options: TOptions,
  formatter: CommandFormatter<TResult>
): Promise<void> {
  let result: CommandResult<TResult>;
  try {
    result = await handler(options);
  } catch (error) {
    if (error instanceof CommandError) {
      fail(options, error.message, error.exitCode, error.metadata.suggestion);
    }
    if (error instanceof VaultError) {
      log.debug(`${error.name} (${error.code})`);
      fail(options, error.message, error.exitCode, vaultErrorSuggestion(error));
    }
    fail(options, getErrorMessage(error), EXIT_CODES.UNHANDLED_EXCEPTION);
  }

  if (!result.success) {
    fail(
      options,
      result.error,
      result.exitCode ?? EXIT_CODES.UNHANDLED_EXCEPTION,
      result.suggestion
    );
  }

  if (options.json) {
    console.log(JSON.stringify(OutputBuilder.buildJsonSuccess(result.data), null, 2));
  } else {
    console.log(formatter(result.data));
  }
  process.exit(EXIT_CODES.SUCCESS);
}
