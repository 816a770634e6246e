export interface LoggerOptions {
  quiet?: boolean;
  verbose?: boolean;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Console logger with a `[scope]` prefix.
 * `quiet` mutes info, `verbose` enables debug; warnings and errors always go to stderr.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(message) {
      if (options.verbose) {
        console.log(`${prefix} ${message}`);
      }
    },
    info(message) {
      if (!options.quiet) {
        console.log(`${prefix} ${message}`);
      }
    },
    warn(message) {
      console.warn(`${prefix} ${message}`);
    },
    error(message) {
      console.error(`${prefix} ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
