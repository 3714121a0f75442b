/**
 * Centralized logger
 * - Silent in production builds
 * - Never used to report plugin failures; those go to the caller
 */

function callConsole(args: unknown[]): void {
  if (typeof console === 'undefined' || typeof console.warn !== 'function') {
    return;
  }
  try {
    console.warn(...args);
  } catch {
    // ignore logging errors
  }
}

export const logger = {
  warn: (...args: unknown[]) => {
    if (process.env.NODE_ENV === 'production') return;
    callConsole(['[lazyplug]', ...args]);
  },
};
