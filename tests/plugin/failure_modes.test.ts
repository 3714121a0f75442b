import { describe, it, expect } from 'vitest';
import { get, getMut, getRef, has } from '../../src/plugin/access';
import { definePlugin, defineFalliblePlugin } from '../../src/plugin/plugin';
import { err, ok, unwrapOr } from '../../src/common/result';
import { Extended } from '../fixtures/hosts';

type ParseError = { reason: 'empty' } | { reason: 'not-a-number'; input: string };

function parsePlugin(name: string) {
  let calls = 0;
  const plugin = defineFalliblePlugin<Extended, number, ParseError>({
    name,
    evaluate: (h) => {
      calls++;
      if (h.label === '') return err({ reason: 'empty' });
      const n = Number(h.label);
      return Number.isNaN(n) ? err({ reason: 'not-a-number', input: h.label }) : ok(n);
    },
  });
  return { plugin, calls: () => calls };
}

describe('failure modes (PLUGIN)', () => {
  it('should return undefined and cache nothing when an optional plugin has no value', () => {
    const host = new Extended();
    let calls = 0;
    const plugin = definePlugin({
      name: 'Missing',
      evaluate: (h: Extended): string | undefined => {
        calls++;
        return h.counter > 0 ? `count ${h.counter}` : undefined;
      },
    });
    expect(get(host, plugin)).toBeUndefined();
    expect(getRef(host, plugin)).toBeUndefined();
    expect(getMut(host, plugin)).toBeUndefined();
    expect(has(host, plugin)).toBe(false);
    expect(calls).toBe(3);
  });

  it('should retry an optional plugin after a failure', () => {
    const host = new Extended();
    const plugin = definePlugin({
      name: 'Eventually',
      evaluate: (h: Extended) => (h.counter > 0 ? h.counter : undefined),
    });
    expect(get(host, plugin)).toBeUndefined();
    host.counter = 4;
    expect(get(host, plugin)).toBe(4);
    host.counter = 9;
    expect(get(host, plugin)).toBe(4);
  });

  it('should return the explicit error verbatim and leave the store unchanged', () => {
    const host = new Extended();
    host.label = 'abc';
    const { plugin } = parsePlugin('ParseLabel');
    expect(get(host, plugin)).toEqual({
      ok: false,
      error: { reason: 'not-a-number', input: 'abc' },
    });
    expect(has(host, plugin)).toBe(false);
    expect(host.extensions.isEmpty()).toBe(true);
  });

  it('should distinguish failure causes through the error value', () => {
    const host = new Extended();
    host.label = '';
    const { plugin } = parsePlugin('ParseEmpty');
    const result = get(host, plugin);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('empty');
  });

  it('should retry an explicit-error plugin until it succeeds, then stop evaluating', () => {
    const host = new Extended();
    host.label = 'x';
    const { plugin, calls } = parsePlugin('ParseRetry');
    expect(unwrapOr(get(host, plugin), -1)).toBe(-1);
    host.label = '12';
    expect(get(host, plugin)).toEqual({ ok: true, value: 12 });
    host.label = '99';
    expect(get(host, plugin)).toEqual({ ok: true, value: 12 });
    expect(calls()).toBe(2);
  });

  it('should wrap a slot in Ok from getMut on an explicit-error plugin', () => {
    const host = new Extended();
    host.label = '5';
    const { plugin } = parsePlugin('ParseSlot');
    const result = getMut(host, plugin);
    if (!result.ok) throw new Error('expected success');
    result.value.value = 6;
    expect(get(host, plugin)).toEqual({ ok: true, value: 6 });
  });

  it('should propagate an exception thrown by evaluate without caching', () => {
    const host = new Extended();
    let calls = 0;
    const plugin = definePlugin({
      name: 'Throws',
      evaluate: (_h: Extended) => {
        calls++;
        if (calls === 1) throw new Error('boom');
        return 'recovered';
      },
    });
    expect(() => get(host, plugin)).toThrow('boom');
    expect(has(host, plugin)).toBe(false);
    expect(host.extensions.isComputing(plugin)).toBe(false);
    expect(get(host, plugin)).toBe('recovered');
  });
});
