import { describe, it, expect, beforeEach } from 'vitest';
import { ResultCache, cacheKey } from './result-cache.js';

describe('cacheKey', () => {
  it('is deterministic and 32 hex characters long', () => {
    const key = cacheKey('show pending orders', 'shop-1');
    expect(key).toMatch(/^[0-9a-f]{32}$/);
    expect(cacheKey('show pending orders', 'shop-1')).toBe(key);
  });

  it('scopes keys by tenant', () => {
    expect(cacheKey('hello', 'shop-1')).not.toBe(cacheKey('hello', 'shop-2'));
    expect(cacheKey('hello')).not.toBe(cacheKey('hello', 'shop-1'));
  });
});

describe('ResultCache', () => {
  let clock: number;
  let cache: ResultCache<string>;

  beforeEach(() => {
    clock = 1_000;
    cache = new ResultCache<string>({ ttlMs: 100, maxEntries: 3, now: () => clock });
  });

  it('returns a stored value until its TTL expires', () => {
    cache.put('a', 'alpha');

    clock += 99;
    expect(cache.get('a')).toBe('alpha');

    clock += 1;
    expect(cache.get('a')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('honours a per-entry TTL override', () => {
    cache.put('a', 'alpha', 500);
    clock += 300;
    expect(cache.get('a')).toBe('alpha');
  });

  it('evicts the least recently used entry when full', () => {
    cache.put('a', 'alpha');
    cache.put('b', 'beta');
    cache.put('c', 'gamma');

    // touch a so b becomes the oldest
    cache.get('a');
    cache.put('d', 'delta');

    expect(cache.has('b')).toBe(false);
    expect(cache.has('a')).toBe(true);
    expect(cache.has('c')).toBe(true);
    expect(cache.has('d')).toBe(true);
    expect(cache.stats().evictions).toBe(1);
  });

  it('overwrites duplicate puts without growing', () => {
    cache.put('a', 'alpha');
    cache.put('a', 'again');

    expect(cache.size).toBe(1);
    expect(cache.get('a')).toBe('again');
  });

  it('prunes expired entries', () => {
    cache.put('a', 'alpha');
    clock += 50;
    cache.put('b', 'beta');
    clock += 60;

    expect(cache.prune()).toBe(1);
    expect(cache.has('a')).toBe(false);
    expect(cache.has('b')).toBe(true);
  });

  it('tracks hits and misses', () => {
    cache.put('a', 'alpha');
    cache.get('a');
    cache.get('missing');

    const stats = cache.stats();
    expect(stats.hits).toBe(1);
    expect(stats.misses).toBe(1);
  });

  it('evicts immediately when capacity shrinks', () => {
    cache.put('a', 'alpha');
    cache.put('b', 'beta');
    cache.put('c', 'gamma');

    cache.configure({ maxEntries: 1 });

    expect(cache.size).toBe(1);
    expect(cache.has('c')).toBe(true);
  });

  it('deletes and clears entries', () => {
    cache.put('a', 'alpha');
    cache.put('b', 'beta');

    expect(cache.delete('a')).toBe(true);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
