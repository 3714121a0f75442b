/**
 * Compute-or-fetch access to plugin values on extensible hosts
 *
 * Every mode runs the same protocol and differs only in what a hit returns:
 *
 *   1. look up the plugin's entry in the host's store
 *   2. hit  → return it (clone, reference or slot)
 *   3. miss → evaluate the plugin with the host
 *        failure → return the failure, store untouched
 *        success → insert, then read back through step 2
 *
 * INVARIANTS:
 * - A plugin is evaluated at most once per host while its entry exists
 * - Failures are never cached; the next request evaluates again
 * - A request for a plugin already being evaluated on the same host throws
 *   ReentrantComputationError
 * - A plugin that filled its own entry during evaluation throws
 *   PluginContractError; the entry it wrote is left as is
 *
 * `compute` bypasses the store entirely.
 */

import type { FalliblePlugin, OptionalPlugin, Plugin } from './plugin';
import { extensionsOf, type Extensible } from './extensible';
import type { KeyedStore, Slot } from '../store/keyed-store';
import type { StoreKey } from '../store/key';
import { ok, type Result } from '../common/result';
import { PluginContractError } from '../common/errors';
import { assertDefined } from '../dev/invariant';
import { warnOnce } from '../dev/warnings';
import { recordEvaluation } from '../dev/dev-namespace';

type Reader<V, R> = (slot: Slot<V>) => R;

function evaluateExclusive<V, T>(
  store: KeyedStore,
  key: StoreKey<V>,
  run: () => T
): T {
  store.enterComputation(key);
  try {
    recordEvaluation(key.name);
    return run();
  } finally {
    store.exitComputation(key);
  }
}

function fill<V, R>(
  store: KeyedStore,
  key: StoreKey<V>,
  value: V,
  read: Reader<V, R>
): R {
  if (store.contains(key)) throw new PluginContractError(key.name);
  store.insert(key, value);
  const slot = store.getMut(key);
  assertDefined(slot, `Entry for "${key.name}" missing right after insert`);
  return read(slot);
}

function fetchOptional<H extends Extensible, V, R>(
  host: H,
  plugin: OptionalPlugin<H, V>,
  read: Reader<V, R>
): R | undefined {
  const store = extensionsOf(host);
  const cached = store.getMut(plugin);
  if (cached !== undefined) return read(cached);

  const value = evaluateExclusive(store, plugin, () => plugin.evaluate(host));
  if (value === undefined) return undefined;
  return fill(store, plugin, value, read);
}

function fetchResult<H extends Extensible, V, E, R>(
  host: H,
  plugin: FalliblePlugin<H, V, E>,
  read: Reader<V, R>
): Result<R, E> {
  const store = extensionsOf(host);
  const cached = store.getMut(plugin);
  if (cached !== undefined) return ok(read(cached));

  const result = evaluateExclusive(store, plugin, () => plugin.evaluate(host));
  if (!result.ok) return result;
  return ok(fill(store, plugin, result.value, read));
}

// Prototypes structuredClone restores on the copy
const CLONED_PROTOTYPES = new Set<unknown>([
  Object.prototype,
  Array.prototype,
  Map.prototype,
  Set.prototype,
  Date.prototype,
  RegExp.prototype,
  ArrayBuffer.prototype,
]);

function keepsPrototype(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return (
    proto === null || CLONED_PROTOTYPES.has(proto) || ArrayBuffer.isView(value)
  );
}

function cloneOf<H, V, E>(plugin: Plugin<H, V, E>, value: V): V {
  if (plugin.clone) return plugin.clone(value);
  if (typeof value === 'object' && value !== null && !keepsPrototype(value)) {
    warnOnce(
      `clone:${plugin.name}`,
      `get(${plugin.name}) clones a class instance with structuredClone, which drops its prototype. ` +
        'Pass `clone` to the plugin definition, or use getRef().'
    );
  }
  return structuredClone(value);
}

/**
 * Return a copy of the plugin's value, computing it on first request.
 *
 * The copy comes from the plugin's `clone`, or `structuredClone` when it
 * has none; values that cannot be structured-cloned need a `clone`.
 */
export function get<H extends Extensible, V>(
  host: H,
  plugin: OptionalPlugin<H, V>
): V | undefined;
export function get<H extends Extensible, V, E>(
  host: H,
  plugin: FalliblePlugin<H, V, E>
): Result<V, E>;
export function get<H extends Extensible, V, E>(
  host: H,
  plugin: Plugin<H, V, E>
): V | undefined | Result<V, E> {
  const read = (slot: Slot<V>) => cloneOf(plugin, slot.value);
  return plugin.strategy === 'optional'
    ? fetchOptional(host, plugin, read)
    : fetchResult(host, plugin, read);
}

/**
 * Return the cached value itself, computing it on first request.
 */
export function getRef<H extends Extensible, V>(
  host: H,
  plugin: OptionalPlugin<H, V>
): Readonly<V> | undefined;
export function getRef<H extends Extensible, V, E>(
  host: H,
  plugin: FalliblePlugin<H, V, E>
): Result<Readonly<V>, E>;
export function getRef<H extends Extensible, V, E>(
  host: H,
  plugin: Plugin<H, V, E>
): Readonly<V> | undefined | Result<Readonly<V>, E> {
  const read = (slot: Slot<V>): Readonly<V> => slot.value;
  return plugin.strategy === 'optional'
    ? fetchOptional(host, plugin, read)
    : fetchResult(host, plugin, read);
}

/**
 * Return a slot onto the cached entry, computing it on first request.
 * The slot detaches once the entry is removed or replaced.
 */
export function getMut<H extends Extensible, V>(
  host: H,
  plugin: OptionalPlugin<H, V>
): Slot<V> | undefined;
export function getMut<H extends Extensible, V, E>(
  host: H,
  plugin: FalliblePlugin<H, V, E>
): Result<Slot<V>, E>;
export function getMut<H extends Extensible, V, E>(
  host: H,
  plugin: Plugin<H, V, E>
): Slot<V> | undefined | Result<Slot<V>, E> {
  const read = (slot: Slot<V>) => slot;
  return plugin.strategy === 'optional'
    ? fetchOptional(host, plugin, read)
    : fetchResult(host, plugin, read);
}

export function has<H extends Extensible, V, E>(
  host: H,
  plugin: Plugin<H, V, E>
): boolean {
  return extensionsOf(host).contains(plugin);
}

/**
 * Evaluate a plugin once, without reading or writing any cache.
 * Works for hosts that are not extensible.
 */
export function compute<H, V>(
  host: H,
  plugin: OptionalPlugin<H, V>
): V | undefined;
export function compute<H, V, E>(
  host: H,
  plugin: FalliblePlugin<H, V, E>
): Result<V, E>;
export function compute<H, V, E>(
  host: H,
  plugin: Plugin<H, V, E>
): V | undefined | Result<V, E> {
  recordEvaluation(plugin.name);
  return plugin.evaluate(host);
}
