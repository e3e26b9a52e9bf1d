import { afterEach, describe, expect, it, vi } from 'vitest';

import { MetricsCollectorService } from './metrics-collector.service';
import { MetricsService } from './metrics.service';
import type { AppConfigService } from '../config/app-config.service';
import type { DatabaseService } from '../database/kysely/database.service';
import { registerCache, SimpleCacheImpl, unregisterCache } from '../infra/cache';
import { LimiterKey } from '../rate-limiting/bottleneck-rate-limiter.interfaces';
import type { BottleneckRateLimiterService } from '../rate-limiting/bottleneck-rate-limiter.service';

type RateLimiterServiceStub = {
  readonly getAllKeys: ReturnType<typeof vi.fn>;
  readonly getMetrics: ReturnType<typeof vi.fn>;
};

type DatabaseServiceStub = {
  readonly getPool: ReturnType<typeof vi.fn>;
};

const createCollector = (
  metricsService: MetricsService,
  metricsEnabled: boolean,
): MetricsCollectorService => {
  const rateLimiterStub: RateLimiterServiceStub = {
    getAllKeys: vi.fn().mockReturnValue([LimiterKey.CRYPTO_PRICES]),
    getMetrics: vi.fn().mockReturnValue({ queueSize: 3, running: 1 }),
  };
  const databaseServiceStub: DatabaseServiceStub = {
    getPool: vi.fn().mockReturnValue({ totalCount: 5, idleCount: 4, waitingCount: 0 }),
  };

  return new MetricsCollectorService(
    metricsService,
    rateLimiterStub as unknown as BottleneckRateLimiterService,
    databaseServiceStub as unknown as DatabaseService,
    { metricsEnabled } as unknown as AppConfigService,
  );
};

describe('MetricsCollectorService', (): void => {
  afterEach((): void => {
    unregisterCache('collector_test');
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('copies limiter, cache and pool state into gauges', async (): Promise<void> => {
    const metricsService: MetricsService = new MetricsService();
    const cache: SimpleCacheImpl<number> = new SimpleCacheImpl<number>({ ttlSec: 60 });
    registerCache('collector_test', cache);
    cache.set('a', 1);
    cache.get('a');
    cache.get('b');
    const collector: MetricsCollectorService = createCollector(metricsService, true);

    collector.collect();
    const metrics: string = await metricsService.getMetrics();

    expect(metrics).toContain('rate_limit_queue_size{limiter="crypto_prices"} 3');
    expect(metrics).toContain('cache_keys{cache="collector_test"} 1');
    expect(metrics).toContain('cache_hits_total{cache="collector_test"} 1');
    expect(metrics).toContain('cache_misses_total{cache="collector_test"} 1');
    expect(metrics).toContain('pg_pool_connections_total 5');
    expect(metrics).toContain('pg_pool_connections_idle 4');
    expect(metrics).toContain('pg_pool_connections_waiting 0');
  });

  it('does not start the interval when metrics are disabled', (): void => {
    vi.useFakeTimers();
    const collector: MetricsCollectorService = createCollector(new MetricsService(), false);
    const collectSpy = vi.spyOn(collector, 'collect');

    collector.onModuleInit();
    vi.advanceTimersByTime(30_000);

    expect(collectSpy).not.toHaveBeenCalled();
  });

  it('collects on every interval until destroyed', (): void => {
    vi.useFakeTimers();
    const collector: MetricsCollectorService = createCollector(new MetricsService(), true);
    const collectSpy = vi.spyOn(collector, 'collect');

    collector.onModuleInit();
    vi.advanceTimersByTime(20_000);
    collector.onModuleDestroy();
    vi.advanceTimersByTime(20_000);

    expect(collectSpy).toHaveBeenCalledTimes(2);
  });
});
