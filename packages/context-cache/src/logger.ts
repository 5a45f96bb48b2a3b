import type { CacheLogger } from './types.js';

const PREFIX = '[context-cache]';

const silentLogger: CacheLogger = {
  debug: () => undefined,
};

/** Logger that writes to `console.debug`. */
export function createConsoleLogger(): CacheLogger {
  return {
    debug(message, meta) {
      if (meta === undefined) {
        console.debug(`${PREFIX} ${message}`);
      } else {
        console.debug(`${PREFIX} ${message}`, meta);
      }
    },
  };
}

/**
 * Pick the sink for a cache instance: an explicit logger wins, otherwise
 * console output when verbose, otherwise nothing.
 */
export function resolveLogger(logger: CacheLogger | undefined, verbose: boolean): CacheLogger {
  if (logger) return logger;
  return verbose ? createConsoleLogger() : silentLogger;
}
