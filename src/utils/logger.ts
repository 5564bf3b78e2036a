import consola from "consola";

/**
 * Logger abstraction for structgen
 *
 * Allows swapping between different logging implementations:
 * - consola (CLI) - Rich terminal output with colors and icons
 * - Silent logger (testing) - No-op for tests or silent mode
 */
export interface StructgenLogger {
  /** Log an informational message */
  info(message: string): void;
  /** Log a success message */
  success(message: string): void;
  /** Log a warning message */
  warn(message: string): void;
  /** Log an error message */
  error(message: string): void;
  /** Log a "starting" message */
  start(message: string): void;
  /** Log a boxed message (for summaries) */
  box(options: { title: string; message: string }): void;
}

/**
 * Create a logger that uses consola for rich terminal output.
 * This is the default logger used by the CLI.
 *
 * consola writes informational output to stdout, so `--console` runs
 * route everything through stderr to keep generated code clean.
 */
export function createConsolaLogger(
  options: { stderr?: boolean } = {},
): StructgenLogger {
  const instance = options.stderr
    ? consola.create({ stdout: process.stderr, stderr: process.stderr })
    : consola;

  return {
    info: (message) => instance.info(message),
    success: (message) => instance.success(message),
    warn: (message) => instance.warn(message),
    error: (message) => instance.error(message),
    start: (message) => instance.start(message),
    box: (options) => instance.box(options),
  };
}

/**
 * Create a silent logger that does nothing.
 * Useful for testing or when output should be suppressed.
 */
export function createSilentLogger(): StructgenLogger {
  const noop = () => {};
  return {
    info: noop,
    success: noop,
    warn: noop,
    error: noop,
    start: noop,
    box: noop,
  };
}

/**
 * Default logger instance using consola.
 * Used when no logger is explicitly provided.
 */
export const defaultLogger = createConsolaLogger();
