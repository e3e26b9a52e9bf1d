import type { ICacheStats, ICacheStatsSource } from './cache.interfaces';

const registry: Map<string, ICacheStatsSource> = new Map<string, ICacheStatsSource>();

export function registerCache(name: string, cache: ICacheStatsSource): void {
  registry.set(name, cache);
}

export function unregisterCache(name: string): void {
  registry.delete(name);
}

export function getAllCacheStats(): ReadonlyMap<string, ICacheStats> {
  const result: Map<string, ICacheStats> = new Map<string, ICacheStats>();

  for (const [name, cache] of registry) {
    result.set(name, cache.stats());
  }

  return result;
}
