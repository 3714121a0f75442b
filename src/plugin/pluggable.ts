/**
 * Base class for hosts that want the access functions as methods.
 *
 * Subclasses own a fresh KeyedStore and gain get/getRef/getMut/has/compute
 * bound to themselves; plugins are typed against the subclass.
 *
 * @example
 * ```ts
 * class Request extends Pluggable {
 *   constructor(readonly url: string) { super(); }
 * }
 * const Path = definePlugin({
 *   name: 'Path',
 *   evaluate: (req: Request) => new URL(req.url).pathname,
 * });
 * new Request('https://example.test/a?b=1').get(Path); // '/a'
 * ```
 */

import * as access from './access';
import type { Extensible } from './extensible';
import type { FalliblePlugin, OptionalPlugin, Plugin } from './plugin';
import { KeyedStore, type Slot } from '../store/keyed-store';
import type { Result } from '../common/result';

export abstract class Pluggable implements Extensible {
  readonly extensions: KeyedStore = new KeyedStore();

  get<V>(plugin: OptionalPlugin<this, V>): V | undefined;
  get<V, E>(plugin: FalliblePlugin<this, V, E>): Result<V, E>;
  get<V, E>(plugin: Plugin<this, V, E>): V | undefined | Result<V, E> {
    return plugin.strategy === 'optional'
      ? access.get(this, plugin)
      : access.get(this, plugin);
  }

  getRef<V>(plugin: OptionalPlugin<this, V>): Readonly<V> | undefined;
  getRef<V, E>(plugin: FalliblePlugin<this, V, E>): Result<Readonly<V>, E>;
  getRef<V, E>(
    plugin: Plugin<this, V, E>
  ): Readonly<V> | undefined | Result<Readonly<V>, E> {
    return plugin.strategy === 'optional'
      ? access.getRef(this, plugin)
      : access.getRef(this, plugin);
  }

  getMut<V>(plugin: OptionalPlugin<this, V>): Slot<V> | undefined;
  getMut<V, E>(plugin: FalliblePlugin<this, V, E>): Result<Slot<V>, E>;
  getMut<V, E>(
    plugin: Plugin<this, V, E>
  ): Slot<V> | undefined | Result<Slot<V>, E> {
    return plugin.strategy === 'optional'
      ? access.getMut(this, plugin)
      : access.getMut(this, plugin);
  }

  has<V, E>(plugin: Plugin<this, V, E>): boolean {
    return access.has(this, plugin);
  }

  compute<V>(plugin: OptionalPlugin<this, V>): V | undefined;
  compute<V, E>(plugin: FalliblePlugin<this, V, E>): Result<V, E>;
  compute<V, E>(plugin: Plugin<this, V, E>): V | undefined | Result<V, E> {
    return plugin.strategy === 'optional'
      ? access.compute(this, plugin)
      : access.compute(this, plugin);
  }
}
