/**
 * Type identity for store keys
 *
 * JavaScript erases types at run time, so the identity of a key *object*
 * stands in for the identity of a type. Every key object receives one
 * TypeId the first time it is seen and keeps it for the life of the process.
 *
 * INVARIANTS:
 * - Injective: distinct key objects never share a TypeId
 * - Stable: the same key object always yields the same TypeId
 * - Totally ordered: ids increase in order of first sight
 */

export type TypeId = number & { readonly __brand: 'TypeId' };

const ids = new WeakMap<object, TypeId>();
let nextId = 1;

export function typeIdOf(key: object): TypeId {
  let id = ids.get(key);
  if (id === undefined) {
    id = nextId++ as TypeId;
    ids.set(key, id);
  }
  return id;
}

export function compareTypeIds(a: TypeId, b: TypeId): number {
  return a - b;
}
