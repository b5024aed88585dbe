export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const SILENT_LOGGER: Logger = {
  log: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Console logger with a fixed prefix. `log` is debug output and only printed
 * when `verbose` is set.
 */
export function createConsoleLogger(prefix = "[valuegen]", verbose = false): Logger {
  return {
    log: (message) => {
      if (verbose) console.log(`${prefix} ${message}`);
    },
    info: (message) => console.info(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message) => console.error(`${prefix} ${message}`),
  };
}
