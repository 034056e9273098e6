/** Minimal structured logger accepted by the catalog, resolver and dataset. */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const PREFIX = "[scene-index]";

/** Writes to the console. `debug` output is only printed when `verbose` is set. */
export function createConsoleLogger({
  verbose = false,
}: { verbose?: boolean } = {}): Logger {
  const write =
    (print: (...args: unknown[]) => void) =>
    (message: string, context?: Record<string, unknown>) => {
      if (context === undefined) {
        print(`${PREFIX} ${message}`);
      } else {
        print(`${PREFIX} ${message}`, context);
      }
    };

  return {
    debug: verbose ? write(console.debug) : () => {},
    info: write(console.info),
    warn: write(console.warn),
    error: write(console.error),
  };
}

export const consoleLogger: Logger = createConsoleLogger();

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
