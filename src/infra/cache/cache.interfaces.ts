export interface ICacheStats {
  readonly keys: number;
  readonly hits: number;
  readonly misses: number;
}

export interface ICacheStatsSource {
  stats(): ICacheStats;
}

export interface ISimpleCache<T> extends ICacheStatsSource {
  get(key: string): T | undefined;
  set(key: string, value: T, ttlSec?: number): void;
  flush(): void;
}

export type SimpleCacheOptions = {
  readonly ttlSec: number;
  readonly maxKeys?: number;
  readonly checkperiod?: number;
};
