/**
 * Centralized logger
 * - debug/info/warn are silent in production builds
 * - error always reaches the console
 * - every line carries a scope prefix so interleaved sessions stay readable
 */

type LogMethod = 'debug' | 'info' | 'warn' | 'error';

function callConsole(method: LogMethod, args: unknown[]): void {
  if (typeof console === 'undefined') return;
  const fn = console[method];
  if (typeof fn !== 'function') return;
  try {
    fn.apply(console, args);
  } catch {
    // ignore logging errors
  }
}

export type Logger = {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
};

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (...args) => {
      if (process.env.NODE_ENV === 'production') return;
      callConsole('debug', [prefix, ...args]);
    },

    info: (...args) => {
      if (process.env.NODE_ENV === 'production') return;
      callConsole('info', [prefix, ...args]);
    },

    warn: (...args) => {
      if (process.env.NODE_ENV === 'production') return;
      callConsole('warn', [prefix, ...args]);
    },

    error: (...args) => {
      callConsole('error', [prefix, ...args]);
    },
  };
}

export const logger = createLogger('stackable');

/** Debug tracing for the render pipeline (`STACKABLE_SSR_DEBUG=1`). */
export function isRenderDebugEnabled(): boolean {
  if (process.env.NODE_ENV === 'production') return false;
  const flag = process.env.STACKABLE_SSR_DEBUG;
  return flag === '1' || flag === 'true';
}
