/**
 * lazyplug: lazily evaluated, order-independent plugins for extensible hosts
 *
 * A host owns a KeyedStore; plugins derive values from the host, and the
 * access functions compute each value on first request and cache it in the
 * host's store.
 */

// Store
export { KeyedStore } from './store/keyed-store';
export type { Slot } from './store/keyed-store';
export { defineKey } from './store/key';
export type { StoreKey, AnyStoreKey } from './store/key';
export { typeIdOf, compareTypeIds } from './store/type-id';
export type { TypeId } from './store/type-id';

// Plugins
export { definePlugin, defineFalliblePlugin } from './plugin/plugin';
export type {
  Plugin,
  OptionalPlugin,
  FalliblePlugin,
  OptionalPluginOptions,
  FalliblePluginOptions,
} from './plugin/plugin';
export { isExtensible, extensionsOf } from './plugin/extensible';
export type { Extensible } from './plugin/extensible';
export { get, getRef, getMut, has, compute } from './plugin/access';
export { Pluggable } from './plugin/pluggable';

// Results and errors
export {
  ok,
  err,
  isOk,
  isErr,
  intoOk,
  unwrapOr,
  mapResult,
} from './common/result';
export type { Ok, Err, Result, Infallible } from './common/result';
export {
  ReentrantComputationError,
  PluginContractError,
  StaleSlotError,
} from './common/errors';
