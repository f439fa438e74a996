import { describe, it, expect } from 'vitest';
import { TtlCache } from './ttl-cache.js';

function createClock(start = 1_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('TtlCache', () => {
  it('returns values until the TTL has passed', () => {
    const clock = createClock();
    const cache = new TtlCache<string, string>({ ttlMs: 100, now: clock.now });

    cache.set('hello', 'bonjour');
    clock.advance(99);
    expect(cache.get('hello')).toBe('bonjour');

    clock.advance(1);
    expect(cache.get('hello')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('measures expiry from insertion, not from last read', () => {
    const clock = createClock();
    const cache = new TtlCache<string, number>({ ttlMs: 100, now: clock.now });

    cache.set('a', 1);
    clock.advance(60);
    expect(cache.get('a')).toBe(1);
    clock.advance(60);
    expect(cache.has('a')).toBe(false);
  });

  it('restarts the window when a key is set again', () => {
    const clock = createClock();
    const cache = new TtlCache<string, number>({ ttlMs: 100, now: clock.now });

    cache.set('a', 1);
    clock.advance(80);
    cache.set('a', 2);
    clock.advance(80);
    expect(cache.get('a')).toBe(2);
  });

  it('prunes only expired entries', () => {
    const clock = createClock();
    const cache = new TtlCache<string, number>({ ttlMs: 100, now: clock.now });

    cache.set('a', 1);
    clock.advance(50);
    cache.set('b', 2);
    clock.advance(70);

    expect(cache.prune()).toBe(1);
    expect(cache.size).toBe(1);
    expect(cache.get('b')).toBe(2);
  });

  it('prunes stale entries on set once a TTL window has passed', () => {
    const clock = createClock();
    const cache = new TtlCache<string, number>({ ttlMs: 100, now: clock.now });

    cache.set('a', 1);
    clock.advance(200);
    cache.set('b', 2);

    expect(cache.size).toBe(1);
  });

  it('supports delete and clear', () => {
    const cache = new TtlCache<string, number>({ ttlMs: 1_000 });
    cache.set('a', 1);
    cache.set('b', 2);

    expect(cache.delete('a')).toBe(true);
    expect(cache.delete('a')).toBe(false);
    cache.clear();
    expect(cache.size).toBe(0);
  });

  it('rejects a non-positive TTL', () => {
    expect(() => new TtlCache({ ttlMs: 0 })).toThrow('TTL must be a positive number');
  });
});
