/**
 * Logger: diagnostic sink injected into the cache layer.
 *
 * The shape is a subset of Fastify's logger, so `fastify.log` can be
 * passed wherever a Logger is accepted.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const noop = (): void => {};

/**
 * Logger that discards everything. Default for the core.
 */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/**
 * Create a logger that writes through `console`, dropping messages
 * below `level`.
 */
export function createConsoleLogger(level: LogLevel = 'info', prefix = 'rfc-mirror'): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (l: Exclude<LogLevel, 'silent'>) => LEVEL_ORDER[l] >= threshold;

  return {
    debug(message) {
      if (enabled('debug')) console.debug(`[${prefix}] ${message}`);
    },
    info(message) {
      if (enabled('info')) console.log(`[${prefix}] ${message}`);
    },
    warn(message) {
      if (enabled('warn')) console.warn(`[${prefix}] ${message}`);
    },
    error(message) {
      if (enabled('error')) console.error(`[${prefix}] ${message}`);
    },
  };
}
