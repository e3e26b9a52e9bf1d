import NodeCache from 'node-cache';

import type { ICacheStats, ISimpleCache, SimpleCacheOptions } from './cache.interfaces';

/**
 * In-process cache over node-cache. Entries are stored by reference and
 * expire lazily on read; once `maxKeys` is reached the oldest key makes room.
 */
export class SimpleCacheImpl<T> implements ISimpleCache<T> {
  private readonly cache: NodeCache;
  private readonly maxKeys: number | undefined;
  private readonly defaultTtlSec: number;

  public constructor(options: SimpleCacheOptions) {
    this.maxKeys = options.maxKeys;
    this.defaultTtlSec = options.ttlSec;
    this.cache = new NodeCache({
      stdTTL: options.ttlSec,
      checkperiod: options.checkperiod ?? 0,
      useClones: false,
    });
  }

  public get(key: string): T | undefined {
    return this.cache.get<T>(key);
  }

  public set(key: string, value: T, ttlSec?: number): void {
    this.evictIfNeeded(key);
    this.cache.set(key, value, ttlSec ?? this.defaultTtlSec);
  }

  public flush(): void {
    this.cache.flushAll();
  }

  public stats(): ICacheStats {
    const nodeStats: NodeCache.Stats = this.cache.getStats();

    return {
      keys: nodeStats.keys,
      hits: nodeStats.hits,
      misses: nodeStats.misses,
    };
  }

  private evictIfNeeded(incomingKey: string): void {
    if (this.maxKeys === undefined || this.cache.has(incomingKey)) {
      return;
    }

    const allKeys: string[] = this.cache.keys();

    while (allKeys.length >= this.maxKeys) {
      const oldestKey: string | undefined = allKeys.shift();

      if (oldestKey === undefined) {
        break;
      }

      this.cache.del(oldestKey);
    }
  }
}
