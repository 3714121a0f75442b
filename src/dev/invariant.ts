/**
 * Invariant assertion utilities
 *
 * Core principle: fail fast when invariants are violated.
 * Violations are caller bugs, never recoverable conditions.
 */

/**
 * Assert a condition; throw with context if false
 * @internal
 */
export function invariant(
  condition: boolean,
  message: string,
  context?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    const contextStr = context ? '\n' + JSON.stringify(context, null, 2) : '';
    throw new Error(`[lazyplug Invariant] ${message}${contextStr}`);
  }
}

/**
 * Assert a reference is not null/undefined
 * @internal
 */
export function assertDefined<T>(
  value: T | null | undefined,
  message: string
): asserts value is T {
  invariant(value !== null && value !== undefined, message);
}

/**
 * Mark a branch the type system has proven impossible.
 * Reaching it at run time means a value was forged past the types.
 * @internal
 */
export function unreachable(value: never, message: string): never {
  throw new Error(`[lazyplug Invariant] ${message}`, { cause: value });
}
