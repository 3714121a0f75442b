/**
 * Extensible: the capability of owning a KeyedStore
 *
 * A host opts in by exposing one store, for its whole lifetime, as
 * `extensions`. Caching operations in `./access` work on any such host.
 */

import { KeyedStore } from '../store/keyed-store';
import { invariant } from '../dev/invariant';

export interface Extensible {
  readonly extensions: KeyedStore;
}

// First store seen per host; a host must never swap its store out.
const ownedStores = new WeakMap<Extensible, KeyedStore>();

export function isExtensible(value: unknown): value is Extensible {
  return (
    typeof value === 'object' &&
    value !== null &&
    'extensions' in value &&
    value.extensions instanceof KeyedStore
  );
}

/**
 * Resolve the store of `host`, checking that it is a KeyedStore and the same
 * one the host exposed on first access.
 */
export function extensionsOf(host: Extensible): KeyedStore {
  const store = host.extensions;
  invariant(
    store instanceof KeyedStore,
    'Host does not expose a KeyedStore as `extensions`'
  );
  const owned = ownedStores.get(host);
  if (owned === undefined) {
    ownedStores.set(host, store);
  } else {
    invariant(
      owned === store,
      'Host replaced its extensions store; a host owns one store for its lifetime'
    );
  }
  return store;
}
