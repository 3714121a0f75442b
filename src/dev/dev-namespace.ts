/**
 * Dev-only namespace helpers for diagnostics
 *
 * Centralizes access to globalThis.__LAZYPLUG__, where the access layer
 * records how often each plugin was evaluated.
 */

type DevNamespace = Record<string, unknown>;

const NAMESPACE = '__LAZYPLUG__';

/**
 * Get or create the dev namespace on globalThis.
 * Returns an empty object in production to avoid allocations.
 */
export function getDevNamespace(): DevNamespace {
  if (process.env.NODE_ENV === 'production') return {};
  const g = globalThis as unknown as Record<string, DevNamespace | undefined>;
  let ns = g[NAMESPACE];
  if (!ns) {
    ns = {};
    g[NAMESPACE] = ns;
  }
  return ns;
}

export function setDevValue(key: string, value: unknown): void {
  if (process.env.NODE_ENV === 'production') return;
  getDevNamespace()[key] = value;
}

export function getDevValue<T>(key: string): T | undefined {
  if (process.env.NODE_ENV === 'production') return undefined;
  return getDevNamespace()[key] as T | undefined;
}

export function deleteDevValue(key: string): void {
  if (process.env.NODE_ENV === 'production') return;
  delete getDevNamespace()[key];
}

/**
 * Count one evaluation of the named plugin under `evaluations`.
 * Counters are keyed by name: distinct plugins sharing a name share a count.
 */
export function recordEvaluation(name: string): void {
  if (process.env.NODE_ENV === 'production') return;
  const counts = getDevValue<Record<string, number>>('evaluations') ?? {};
  counts[name] = (counts[name] ?? 0) + 1;
  setDevValue('evaluations', counts);
}
