/**
 * Plugins: computations that derive one value from a host
 *
 * A plugin definition is also the store key of the value it produces, so a
 * plugin maps to exactly one result type. Two failure strategies exist:
 *
 * - optional: `evaluate` returns `undefined` when there is no value
 * - result:   `evaluate` returns `Result<V, E>` with a plugin-defined error
 *
 * `evaluate` receives the host itself and may change host state, but the
 * value it returns is usually cached. It must not read or write its own
 * entry in the host's extensions.
 */

import type { StoreKey } from '../store/key';
import type { Result } from '../common/result';

interface PluginBase<V> extends StoreKey<V> {
  /** Copy used by `get()`. Defaults to `structuredClone`. */
  readonly clone?: (value: V) => V;
}

export interface OptionalPlugin<H, V> extends PluginBase<V> {
  readonly strategy: 'optional';
  evaluate(host: H): V | undefined;
}

export interface FalliblePlugin<H, V, E = never> extends PluginBase<V> {
  readonly strategy: 'result';
  evaluate(host: H): Result<V, E>;
}

export type Plugin<H, V, E = never> =
  | OptionalPlugin<H, V>
  | FalliblePlugin<H, V, E>;

export interface OptionalPluginOptions<H, V> {
  name: string;
  evaluate: (host: H) => V | undefined;
  clone?: (value: V) => V;
}

export interface FalliblePluginOptions<H, V, E> {
  name: string;
  evaluate: (host: H) => Result<V, E>;
  clone?: (value: V) => V;
}

/**
 * Define a plugin whose only failure signal is the absence of a value.
 *
 * @example
 * ```ts
 * const Locale = definePlugin({
 *   name: 'Locale',
 *   evaluate: (req: Request) => req.headers['accept-language']?.split(',')[0],
 * });
 * ```
 */
export function definePlugin<H, V>(
  options: OptionalPluginOptions<H, V>
): OptionalPlugin<H, V> {
  const { name, evaluate, clone } = options;
  return Object.freeze({
    name,
    strategy: 'optional' as const,
    evaluate: (host: H) => evaluate(host),
    clone,
  });
}

/**
 * Define a plugin that reports failures as `Err<E>`.
 * Use `Infallible` as `E` for a plugin that always succeeds.
 */
export function defineFalliblePlugin<H, V, E = never>(
  options: FalliblePluginOptions<H, V, E>
): FalliblePlugin<H, V, E> {
  const { name, evaluate, clone } = options;
  return Object.freeze({
    name,
    strategy: 'result' as const,
    evaluate: (host: H) => evaluate(host),
    clone,
  });
}
