/**
 * Console logging with a per-component tag.
 * Debug lines are dropped unless debug output is switched on.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export interface LoggerOptions {
  debug?: boolean;
}

export function isDebugEnabled(env: Record<string, string | undefined> = process.env): boolean {
  const flag = env.GUIDANCE_DEBUG;
  return flag === '1' || flag === 'true';
}

export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
  const debug = options.debug ?? isDebugEnabled();

  return {
    debug(message, ...details) {
      if (debug) console.debug(`${tag}: ${message}`, ...details);
    },
    info(message, ...details) {
      console.log(`${tag}: ${message}`, ...details);
    },
    warn(message, ...details) {
      console.warn(`${tag}: ${message}`, ...details);
    },
    error(message, ...details) {
      console.error(`${tag}: ${message}`, ...details);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
