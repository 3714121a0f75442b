import { describe, it, expect, vi, afterEach } from 'vitest';
import { get } from '../../src/plugin/access';
import { definePlugin } from '../../src/plugin/plugin';
import { warnOnce } from '../../src/dev/warnings';
import { Extended } from '../fixtures/hosts';

class Point {
  constructor(
    readonly x: number,
    readonly y: number
  ) {}
}

describe('dev warnings (DEV)', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should warn once per id', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    warnOnce('same', 'first');
    warnOnce('same', 'second');
    warnOnce('other', 'third');
    expect(warn.mock.calls).toEqual([
      ['[lazyplug]', 'first'],
      ['[lazyplug]', 'third'],
    ]);
  });

  it('should stay silent in production', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    process.env.NODE_ENV = 'production';
    warnOnce('prod', 'hidden');
    expect(warn).not.toHaveBeenCalled();
  });

  it('should warn when get clones a class instance without a custom clone', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const host = new Extended();
    const Origin = definePlugin({
      name: 'Origin',
      evaluate: (_h: Extended) => new Point(1, 2),
    });
    const copy = get(host, Origin);
    get(host, Origin);
    expect(copy).toEqual({ x: 1, y: 2 });
    expect(copy instanceof Point).toBe(false);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][1])).toMatch(/^get\(Origin\) clones a class instance/);
  });

  it('should not warn for plain values or plugins with a clone', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const host = new Extended();
    const Plain = definePlugin({
      name: 'Plain',
      evaluate: (_h: Extended) => ({ x: 1 }),
    });
    const Cloned = definePlugin({
      name: 'Cloned',
      evaluate: (_h: Extended) => new Point(3, 4),
      clone: (p) => new Point(p.x, p.y),
    });
    get(host, Plain);
    expect(get(host, Cloned)).toBeInstanceOf(Point);
    expect(warn).not.toHaveBeenCalled();
  });

  it('should not warn for built-ins that structuredClone copies with their prototype', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const host = new Extended();
    const Lookup = definePlugin({
      name: 'Lookup',
      evaluate: (_h: Extended) => new Map([[1, 2]]),
    });
    const Stamp = definePlugin({
      name: 'Stamp',
      evaluate: (_h: Extended) => new Date(0),
    });
    const Bytes = definePlugin({
      name: 'Bytes',
      evaluate: (_h: Extended) => new Uint8Array([1, 2]),
    });
    const lookup = get(host, Lookup);
    expect(lookup).toBeInstanceOf(Map);
    expect(lookup?.get(1)).toBe(2);
    expect(get(host, Stamp)).toBeInstanceOf(Date);
    expect(get(host, Bytes)).toBeInstanceOf(Uint8Array);
    expect(warn).not.toHaveBeenCalled();
  });
});
