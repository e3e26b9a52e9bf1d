import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { SimpleCacheImpl } from './simple-cache';

describe('SimpleCacheImpl', (): void => {
  beforeEach((): void => {
    vi.useFakeTimers();
  });

  afterEach((): void => {
    vi.useRealTimers();
  });

  it('returns undefined for missing key', (): void => {
    const cache: SimpleCacheImpl<string> = new SimpleCacheImpl<string>({ ttlSec: 60 });

    expect(cache.get('missing')).toBeUndefined();
  });

  it('stores values by reference', (): void => {
    const cache: SimpleCacheImpl<{ price: number }> = new SimpleCacheImpl<{ price: number }>({
      ttlSec: 60,
    });
    const value: { price: number } = { price: 9_800_000 };

    cache.set('crypto:BTC', value);

    expect(cache.get('crypto:BTC')).toBe(value);
    expect(cache.stats().keys).toBe(1);
  });

  it('expires entries after default ttl', (): void => {
    const cache: SimpleCacheImpl<string> = new SimpleCacheImpl<string>({ ttlSec: 10 });

    cache.set('key', 'value');

    vi.advanceTimersByTime(9_999);
    expect(cache.get('key')).toBe('value');

    vi.advanceTimersByTime(2);
    expect(cache.get('key')).toBeUndefined();
  });

  it('honours per-entry ttl override', (): void => {
    const cache: SimpleCacheImpl<string> = new SimpleCacheImpl<string>({ ttlSec: 60 });

    cache.set('short', 'value', 5);
    cache.set('long', 'value');

    vi.advanceTimersByTime(5_001);

    expect(cache.get('short')).toBeUndefined();
    expect(cache.get('long')).toBe('value');
  });

  it('evicts oldest key when maxKeys is reached', (): void => {
    const cache: SimpleCacheImpl<string> = new SimpleCacheImpl<string>({ ttlSec: 60, maxKeys: 2 });

    cache.set('a', '1');
    cache.set('b', '2');
    cache.set('c', '3');

    expect(cache.get('a')).toBeUndefined();
    expect(cache.get('b')).toBe('2');
    expect(cache.get('c')).toBe('3');
  });

  it('does not evict when replacing an existing key', (): void => {
    const cache: SimpleCacheImpl<string> = new SimpleCacheImpl<string>({ ttlSec: 60, maxKeys: 2 });

    cache.set('a', '1');
    cache.set('b', '2');
    cache.set('a', 'updated');

    expect(cache.get('a')).toBe('updated');
    expect(cache.get('b')).toBe('2');
  });

  it('flushes all entries', (): void => {
    const cache: SimpleCacheImpl<string> = new SimpleCacheImpl<string>({ ttlSec: 60 });
    cache.set('a', '1');
    cache.set('b', '2');

    cache.flush();

    expect(cache.get('a')).toBeUndefined();
    expect(cache.get('b')).toBeUndefined();
    expect(cache.stats().keys).toBe(0);
  });

  it('reports stats', (): void => {
    const cache: SimpleCacheImpl<string> = new SimpleCacheImpl<string>({ ttlSec: 60 });

    cache.set('key', 'value');
    cache.get('key');
    cache.get('missing');

    expect(cache.stats()).toEqual({ keys: 1, hits: 1, misses: 1 });
  });
});
