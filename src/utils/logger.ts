/**
 * Simple logging utility for the SupportFlow engine
 *
 * Provides consistent log formatting with levels: debug, info, warn, error
 *
 * IMPORTANT: All log output goes to stderr so that replies and JSON
 * written by the CLI on stdout stay machine-readable.
 */

export const logger = {
  /**
   * Debug level logging (verbose, per-turn tracing)
   * Output: stderr, only when LOG_LEVEL=debug
   */
  debug: (msg: string, ...args: unknown[]): void => {
    if (process.env.LOG_LEVEL === 'debug') {
      console.error(`[DEBUG] ${msg}`, ...args);
    }
  },

  /**
   * Info level logging (general informational messages)
   */
  info: (msg: string, ...args: unknown[]): void => {
    if (process.env.LOG_LEVEL === 'silent') return;
    console.error(`[INFO] ${msg}`, ...args);
  },

  /**
   * Warning level logging (configuration problems that don't stop the engine)
   * Output: stderr (native console.warn behavior)
   */
  warn: (msg: string, ...args: unknown[]): void => {
    if (process.env.LOG_LEVEL === 'silent') return;
    console.warn(`[WARN] ${msg}`, ...args);
  },

  /**
   * Error level logging (errors that affect functionality)
   */
  error: (msg: string, ...args: unknown[]): void => {
    console.error(`[ERROR] ${msg}`, ...args);
  },
};
