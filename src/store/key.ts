/**
 * Store keys bind a name to exactly one value type.
 *
 * The value type lives only in the type system: `__value` is never set at
 * run time. Its function shape makes `StoreKey<V>` invariant in `V`, so a
 * key for `number` cannot be passed where a key for `unknown` is expected.
 */
export interface StoreKey<V> {
  readonly name: string;
  readonly __value?: (value: V) => V;
}

/** A key with its value type erased, as listed by `KeyedStore.keys()`. */
export type AnyStoreKey = { readonly name: string };

/**
 * Define a standalone key, for entries that are not produced by a plugin.
 *
 * @example
 * ```ts
 * const RequestId = defineKey<string>('RequestId');
 * host.extensions.insert(RequestId, 'req-1');
 * ```
 */
export function defineKey<V>(name: string): StoreKey<V> {
  return Object.freeze({ name });
}
