import { describe, it, expect } from 'vitest';
import { extensionsOf, isExtensible } from '../../src/plugin/extensible';
import { KeyedStore } from '../../src/store/keyed-store';
import { Extended } from '../fixtures/hosts';

class Swapping {
  private current = new KeyedStore();

  get extensions(): KeyedStore {
    return this.current;
  }

  swap(): void {
    this.current = new KeyedStore();
  }
}

describe('extensible hosts (PLUGIN)', () => {
  it('should recognise hosts that expose a KeyedStore', () => {
    expect(isExtensible(new Extended())).toBe(true);
    expect(isExtensible({ extensions: new Map() })).toBe(false);
    expect(isExtensible({})).toBe(false);
    expect(isExtensible(null)).toBe(false);
    expect(isExtensible('text')).toBe(false);
  });

  it('should return the host store', () => {
    const host = new Extended();
    expect(extensionsOf(host)).toBe(host.extensions);
    expect(extensionsOf(host)).toBe(host.extensions);
  });

  it('should fail fast when a host replaces its store', () => {
    const host = new Swapping();
    extensionsOf(host);
    host.swap();
    expect(() => extensionsOf(host)).toThrow(
      /\[lazyplug Invariant\] Host replaced its extensions store/
    );
  });
});
