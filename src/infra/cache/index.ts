export {
  type ICacheStats,
  type ICacheStatsSource,
  type ISimpleCache,
  type SimpleCacheOptions,
} from './cache.interfaces';
export { getAllCacheStats, registerCache, unregisterCache } from './cache-stats-registry';
export { SimpleCacheImpl } from './simple-cache';
