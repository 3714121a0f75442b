/**
 * KeyedStore: heterogeneous container holding at most one value per key
 *
 * INVARIANTS:
 * - Every box pairs a TypeId with a value inserted under the key of that id
 * - At most one box per TypeId
 * - A slot writes through only while its box is still the current entry
 *
 * The store never inspects payloads. Recovering a value's type relies on the
 * insertion discipline carried by `StoreKey<V>`: a box is only ever reached
 * through the id of the key it was inserted under.
 */

import type { AnyStoreKey, StoreKey } from './key';
import { compareTypeIds, typeIdOf, type TypeId } from './type-id';
import { ReentrantComputationError, StaleSlotError } from '../common/errors';

interface Box {
  readonly id: TypeId;
  readonly key: AnyStoreKey;
  value: unknown;
}

// `_key` ties the result type to the key the box was found under.
function unbox<V>(box: Box, _key: StoreKey<V>): V {
  return box.value as V;
}

/**
 * Mutable handle onto one store entry.
 *
 * @example
 * ```ts
 * const hits = store.getMut(HitCount);
 * hits?.update((n) => n + 1);
 * ```
 */
export interface Slot<V> {
  readonly key: StoreKey<V>;
  /** False once the entry was removed or replaced. */
  readonly attached: boolean;
  value: V;
  update(updater: (prev: V) => V): V;
}

class EntrySlot<V> implements Slot<V> {
  constructor(
    private readonly entries: ReadonlyMap<TypeId, Box>,
    private readonly box: Box,
    readonly key: StoreKey<V>
  ) {}

  get attached(): boolean {
    return this.entries.get(this.box.id) === this.box;
  }

  get value(): V {
    this.assertAttached();
    return unbox(this.box, this.key);
  }

  set value(next: V) {
    this.assertAttached();
    this.box.value = next;
  }

  update(updater: (prev: V) => V): V {
    const next = updater(this.value);
    this.value = next;
    return next;
  }

  private assertAttached(): void {
    if (!this.attached) throw new StaleSlotError(this.key.name);
  }
}

export class KeyedStore {
  private readonly entries = new Map<TypeId, Box>();
  private readonly inFlight = new Set<TypeId>();

  get size(): number {
    return this.entries.size;
  }

  isEmpty(): boolean {
    return this.entries.size === 0;
  }

  contains<V>(key: StoreKey<V>): boolean {
    return this.entries.has(typeIdOf(key));
  }

  /**
   * Store `value` under `key`, replacing any prior entry.
   * Slots handed out for a replaced entry become detached.
   */
  insert<V>(key: StoreKey<V>, value: V): void {
    const id = typeIdOf(key);
    this.entries.set(id, { id, key, value });
  }

  get<V>(key: StoreKey<V>): Readonly<V> | undefined {
    const box = this.entries.get(typeIdOf(key));
    return box ? unbox(box, key) : undefined;
  }

  getMut<V>(key: StoreKey<V>): Slot<V> | undefined {
    const box = this.entries.get(typeIdOf(key));
    return box ? new EntrySlot(this.entries, box, key) : undefined;
  }

  remove<V>(key: StoreKey<V>): void {
    this.entries.delete(typeIdOf(key));
  }

  /** Remove the entry for `key` and return its value. */
  take<V>(key: StoreKey<V>): V | undefined {
    const id = typeIdOf(key);
    const box = this.entries.get(id);
    if (!box) return undefined;
    this.entries.delete(id);
    return unbox(box, key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Keys with a stored entry, ordered by TypeId. */
  keys(): AnyStoreKey[] {
    return [...this.entries.values()]
      .sort((a, b) => compareTypeIds(a.id, b.id))
      .map((box) => box.key);
  }

  isComputing<V>(key: StoreKey<V>): boolean {
    return this.inFlight.has(typeIdOf(key));
  }

  /**
   * Mark `key` as being computed for the owning host.
   * A second mark for the same key before `exitComputation` is a reentrant
   * request and throws without touching any entry.
   * @internal
   */
  enterComputation<V>(key: StoreKey<V>): void {
    const id = typeIdOf(key);
    if (this.inFlight.has(id)) throw new ReentrantComputationError(key.name);
    this.inFlight.add(id);
  }

  /** @internal */
  exitComputation<V>(key: StoreKey<V>): void {
    this.inFlight.delete(typeIdOf(key));
  }
}
