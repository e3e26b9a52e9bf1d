import { Injectable, Logger, type OnModuleDestroy, type OnModuleInit } from '@nestjs/common';
import type { Pool } from 'pg';

import { MetricsService } from './metrics.service';
import { AppConfigService } from '../config/app-config.service';
import { DatabaseService } from '../database/kysely/database.service';
import { getAllCacheStats, type ICacheStats } from '../infra/cache';
import type {
  ILimiterMetrics,
  LimiterKey,
} from '../rate-limiting/bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from '../rate-limiting/bottleneck-rate-limiter.service';

const COLLECT_INTERVAL_MS = 10_000;

/** Copies point-in-time state (limiter queues, caches, pg pool) into gauges. */
@Injectable()
export class MetricsCollectorService implements OnModuleInit, OnModuleDestroy {
  private readonly logger: Logger = new Logger(MetricsCollectorService.name);
  private intervalHandle: ReturnType<typeof setInterval> | null = null;

  public constructor(
    private readonly metricsService: MetricsService,
    private readonly rateLimiterService: BottleneckRateLimiterService,
    private readonly databaseService: DatabaseService,
    private readonly appConfigService: AppConfigService,
  ) {}

  public onModuleInit(): void {
    if (!this.appConfigService.metricsEnabled) {
      this.logger.log('metrics_collection_disabled');
      return;
    }

    this.intervalHandle = setInterval((): void => {
      this.collect();
    }, COLLECT_INTERVAL_MS);
    this.intervalHandle.unref();

    this.logger.log(`metrics_collector_started intervalMs=${String(COLLECT_INTERVAL_MS)}`);
  }

  public onModuleDestroy(): void {
    if (this.intervalHandle !== null) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
  }

  public collect(): void {
    this.collectRateLimiterMetrics();
    this.collectCacheMetrics();
    this.collectPoolMetrics();
  }

  private collectRateLimiterMetrics(): void {
    const keys: readonly LimiterKey[] = this.rateLimiterService.getAllKeys();

    for (const key of keys) {
      const metrics: ILimiterMetrics = this.rateLimiterService.getMetrics(key);
      this.metricsService.rateLimitQueueSize.set({ limiter: key }, metrics.queueSize);
    }
  }

  private collectCacheMetrics(): void {
    for (const [name, stats] of getAllCacheStats()) {
      const cacheStats: ICacheStats = stats;
      this.metricsService.cacheKeys.set({ cache: name }, cacheStats.keys);
      this.metricsService.cacheHitsTotal.set({ cache: name }, cacheStats.hits);
      this.metricsService.cacheMissesTotal.set({ cache: name }, cacheStats.misses);
    }
  }

  private collectPoolMetrics(): void {
    const pool: Pool = this.databaseService.getPool();
    this.metricsService.pgPoolTotal.set(pool.totalCount);
    this.metricsService.pgPoolIdle.set(pool.idleCount);
    this.metricsService.pgPoolWaiting.set(pool.waitingCount);
  }
}
