/**
 * Minimal logging surface. Each crawler receives its own instance, nothing is configured globally.
 */
export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  /** Emit debug and info messages. Warnings and errors are always written. */
  verbose?: boolean;
  /** Prepended to every message, e.g. "[crawler]". */
  prefix?: string;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { verbose = false, prefix } = options;
  const format = (message: string) => (prefix ? `${prefix} ${message}` : message);

  return {
    debug: (message, ...meta) => {
      if (verbose) console.debug(format(message), ...meta);
    },
    info: (message, ...meta) => {
      if (verbose) console.log(format(message), ...meta);
    },
    warn: (message, ...meta) => console.warn(format(message), ...meta),
    error: (message, ...meta) => console.error(format(message), ...meta),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
