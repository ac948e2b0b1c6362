/**
 * Logger Interface for Library Code
 *
 * Core modules accept a Logger through their options. The CLI passes its
 * CommandContext (which satisfies Logger); tests pass silentLogger or a
 * vi.fn()-backed mock.
 */

export interface Logger {
  /** Progress worth showing in normal output (budget summaries, counts) */
  info?: (message: string) => void;
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 */
export const consoleLogger: Logger = {
  info: (message: string) => console.log(message),
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.log(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  debug: () => {},
};
