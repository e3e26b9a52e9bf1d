import { afterEach, describe, expect, it } from 'vitest';

import {
  type ICacheStats,
  getAllCacheStats,
  registerCache,
  SimpleCacheImpl,
  unregisterCache,
} from './index';

describe('CacheStatsRegistry', (): void => {
  afterEach((): void => {
    unregisterCache('quotes');
    unregisterCache('fx_a');
    unregisterCache('fx_b');
  });

  it('returns stats for registered caches', (): void => {
    const cache: SimpleCacheImpl<string> = new SimpleCacheImpl<string>({ ttlSec: 60 });
    registerCache('quotes', cache);

    cache.set('key1', 'value1');
    cache.set('key2', 'value2');
    cache.get('key1');
    cache.get('missing');

    const stats: ICacheStats | undefined = getAllCacheStats().get('quotes');

    expect(stats).toEqual({ keys: 2, hits: 1, misses: 1 });
  });

  it('tracks caches independently and forgets unregistered ones', (): void => {
    const cacheA: SimpleCacheImpl<number> = new SimpleCacheImpl<number>({ ttlSec: 60 });
    const cacheB: SimpleCacheImpl<number> = new SimpleCacheImpl<number>({ ttlSec: 60 });
    registerCache('fx_a', cacheA);
    registerCache('fx_b', cacheB);

    cacheA.set('x', 1);
    cacheB.set('y', 2);
    cacheB.set('z', 3);
    unregisterCache('fx_a');

    const allStats: ReadonlyMap<string, ICacheStats> = getAllCacheStats();

    expect(allStats.has('fx_a')).toBe(false);
    expect(allStats.get('fx_b')?.keys).toBe(2);
  });
});
