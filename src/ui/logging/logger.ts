/**
 * Logging utilities for consistent formatted output with log level support.
 *
 * Log lines go to stderr so command output on stdout stays machine-readable.
 * By default only 'info' lines are shown. Set PWVAULT_DEBUG=1 or pass --debug
 * to see 'debug' lines as well.
 *
 * Never log message bodies or key material: bodies carry challenges and
 * encrypted passwords.
 */

// ============================================================================
// Global Debug State
// ============================================================================

let debugEnabled = false;

/**
 * Enable debug logging globally.
 *
 * Called during CLI initialization when the --debug flag is present.
 */
export function enableDebugLogging(): void {
  debugEnabled = true;
}

/**
 * Check if debug logging is currently enabled.
 */
export function isDebugEnabled(): boolean {
  return debugEnabled || process.env['PWVAULT_DEBUG'] === '1';
}

// ============================================================================
// Log Levels
// ============================================================================

/**
 * - 'info': Always shown (user-facing milestones and warnings)
 * - 'debug': Only shown in debug mode (connections, frame summaries, state changes)
 */
export type LogLevel = 'info' | 'debug';

/**
 * Log contexts, used as the line prefix.
 */
export type LogContext = 'pwvault' | 'transport' | 'client' | 'session' | 'keys' | 'config';

// ============================================================================
// Logger Interface
// ============================================================================

export interface Logger {
  /** Log an info message (always shown). */
  info: (message: string) => void;

  /** Log a debug message (only shown in debug mode). */
  debug: (message: string) => void;

  /** Log a message at debug level. */
  (message: string): void;
}

// ============================================================================
// Logger Implementation
// ============================================================================

function write(context: LogContext, message: string, level: LogLevel): void {
  if (level === 'debug' && !isDebugEnabled()) {
    return;
  }
  console.error(`[${context}] ${message}`);
}

/**
 * Create a logger instance for a specific context.
 *
 * @example
 * ```typescript
 * const log = createLogger('transport');
 *
 * log.info('Key pair written to ~/.pwvault/keys');
 * log.debug('Connected to 127.0.0.1:8820 (TLS)');
 * ```
 */
export function createLogger(context: LogContext): Logger {
  const logger: Logger = Object.assign((message: string) => write(context, message, 'debug'), {
    info: (message: string) => write(context, message, 'info'),
    debug: (message: string) => write(context, message, 'debug'),
  });
  return logger;
}

/**
 * Log a one-off message without creating a logger instance.
 */
export function log(context: LogContext, message: string, level: LogLevel = 'debug'): void {
  write(context, message, level);
}
