import { Injectable } from '@nestjs/common';
import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';

// Histogram bucket boundaries in seconds
/* eslint-disable no-magic-numbers */
const SOURCE_DURATION_BUCKETS: number[] = [0.1, 0.25, 0.5, 1, 2, 5, 10];
const SNAPSHOT_DURATION_BUCKETS: number[] = [1, 5, 15, 30, 60, 120, 240, 480];
/* eslint-enable no-magic-numbers */

@Injectable()
export class MetricsService {
  private readonly registry: Registry;

  public readonly priceSourceRequestsTotal: Counter;
  public readonly priceSourceRequestDurationSeconds: Histogram;
  public readonly priceLookupsTotal: Counter;
  public readonly snapshotRunsTotal: Counter;
  public readonly snapshotAssetsTotal: Counter;
  public readonly snapshotRunDurationSeconds: Histogram;
  public readonly keepAlivePingsTotal: Counter;
  public readonly rateLimitQueueSize: Gauge;
  public readonly cacheKeys: Gauge;
  public readonly cacheHitsTotal: Gauge;
  public readonly cacheMissesTotal: Gauge;
  public readonly pgPoolTotal: Gauge;
  public readonly pgPoolIdle: Gauge;
  public readonly pgPoolWaiting: Gauge;

  public constructor() {
    this.registry = new Registry();

    collectDefaultMetrics({ register: this.registry });

    this.priceSourceRequestsTotal = new Counter({
      name: 'price_source_requests_total',
      help: 'Total number of outbound price source requests',
      labelNames: ['source', 'status'] as const,
      registers: [this.registry],
    });

    this.priceSourceRequestDurationSeconds = new Histogram({
      name: 'price_source_request_duration_seconds',
      help: 'Outbound price source request duration in seconds',
      labelNames: ['source'] as const,
      buckets: SOURCE_DURATION_BUCKETS,
      registers: [this.registry],
    });

    this.priceLookupsTotal = new Counter({
      name: 'price_lookups_total',
      help: 'Price lookups by asset kind and outcome',
      labelNames: ['kind', 'result'] as const,
      registers: [this.registry],
    });

    this.snapshotRunsTotal = new Counter({
      name: 'snapshot_runs_total',
      help: 'Portfolio snapshot runs by trigger and outcome',
      labelNames: ['trigger', 'status'] as const,
      registers: [this.registry],
    });

    this.snapshotAssetsTotal = new Counter({
      name: 'snapshot_assets_total',
      help: 'Assets processed by snapshot runs by outcome',
      labelNames: ['result'] as const,
      registers: [this.registry],
    });

    this.snapshotRunDurationSeconds = new Histogram({
      name: 'snapshot_run_duration_seconds',
      help: 'Portfolio snapshot run duration in seconds',
      buckets: SNAPSHOT_DURATION_BUCKETS,
      registers: [this.registry],
    });

    this.keepAlivePingsTotal = new Counter({
      name: 'keep_alive_pings_total',
      help: 'Keep-alive pings by outcome',
      labelNames: ['status'] as const,
      registers: [this.registry],
    });

    this.rateLimitQueueSize = new Gauge({
      name: 'rate_limit_queue_size',
      help: 'Current queue size for rate limiter',
      labelNames: ['limiter'] as const,
      registers: [this.registry],
    });

    this.cacheKeys = new Gauge({
      name: 'cache_keys',
      help: 'Number of keys currently held by cache',
      labelNames: ['cache'] as const,
      registers: [this.registry],
    });

    this.cacheHitsTotal = new Gauge({
      name: 'cache_hits_total',
      help: 'Cache hits since process start',
      labelNames: ['cache'] as const,
      registers: [this.registry],
    });

    this.cacheMissesTotal = new Gauge({
      name: 'cache_misses_total',
      help: 'Cache misses since process start',
      labelNames: ['cache'] as const,
      registers: [this.registry],
    });

    this.pgPoolTotal = new Gauge({
      name: 'pg_pool_connections_total',
      help: 'Total number of connections in the pg pool',
      registers: [this.registry],
    });

    this.pgPoolIdle = new Gauge({
      name: 'pg_pool_connections_idle',
      help: 'Number of idle connections in the pg pool',
      registers: [this.registry],
    });

    this.pgPoolWaiting = new Gauge({
      name: 'pg_pool_connections_waiting',
      help: 'Number of queued requests waiting for a pg connection',
      registers: [this.registry],
    });
  }

  public async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  public getContentType(): string {
    return this.registry.contentType;
  }
}
