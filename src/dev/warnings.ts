/**
 * Dev-only warnings, each emitted at most once per id
 */

import { logger } from './logger';

const emitted = new Set<string>();

export function warnOnce(id: string, message: string): void {
  if (process.env.NODE_ENV === 'production') return;
  if (emitted.has(id)) return;
  emitted.add(id);
  logger.warn(message);
}

/** @internal test hook */
export function resetWarnings(): void {
  emitted.clear();
}
