/**
 * Centralized logger
 * - Keeps production builds silent for debug/info/warn messages
 * - Protects against a missing or throwing `console`
 */

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

function callConsole(method: ConsoleMethod, args: unknown[]): void {
  if (typeof console === 'undefined') return;
  const fn = console[method];
  if (typeof fn !== 'function') return;
  try {
    fn.apply(console, args);
  } catch {
    // ignore logging errors
  }
}

function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}

export const logger = {
  debug: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('debug', args);
  },

  info: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('info', args);
  },

  warn: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('warn', args);
  },

  error: (...args: unknown[]) => {
    callConsole('error', args);
  },
};
