/**
 * Logger Interface for Library Code
 *
 * Library code accepts a Logger via dependency injection. Callers pass
 * their own implementation, tests pass mock or silent loggers.
 */

/**
 * Generic logger interface for library code
 */
export interface Logger {
  /** Log a failure */
  error: (message: string) => void;
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a progress message (optional) */
  info?: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 * Debug output is dropped.
 */
export const consoleLogger: Logger = {
  error: (message: string) => console.error(message),
  warn: (message: string) => console.warn(message),
  info: (message: string) => console.log(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
};
