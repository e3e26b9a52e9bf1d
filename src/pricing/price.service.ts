import { Inject, Injectable, Logger, Optional } from '@nestjs/common';

import { PriceCacheService, buildPriceCacheKey } from './price-cache.service';
import {
  type FetchableAssetKind,
  isFetchableAssetKind,
} from '../common/interfaces/pricing/asset-kind.interfaces';
import type {
  IPriceLookupResult,
  IPriceQuery,
  IPriceQuote,
} from '../common/interfaces/pricing/price-quote.interfaces';
import {
  ParseFailureError,
  type PriceSourceError,
  PriceUnavailableError,
  SourceUnreachableError,
  UnsupportedAssetError,
  isPriceSourceError,
} from '../common/interfaces/pricing/price-source.errors';
import {
  type IPriceSourceAdapter,
  type IPriceSourceRegistry,
  PRICE_SOURCE_REGISTRY,
} from '../common/interfaces/pricing/price-source.interfaces';
import { executeWithExponentialBackoff } from '../common/utils/network/exponential-backoff.util';
import { AppConfigService } from '../config/app-config.service';
import { MetricsService } from '../observability/metrics.service';

type LookupResult = 'cache_hit' | 'fetched' | 'stale' | 'unavailable';

/**
 * Entry point for price lookups. Serves fresh cache entries, otherwise asks the
 * adapter for the query's kind and retries only when the source was unreachable.
 * Concurrent lookups of one query share a single fetch.
 */
@Injectable()
export class PriceService {
  private readonly logger: Logger = new Logger(PriceService.name);
  private readonly inFlight: Map<string, Promise<IPriceQuote>> = new Map<
    string,
    Promise<IPriceQuote>
  >();

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly priceCacheService: PriceCacheService,
    @Inject(PRICE_SOURCE_REGISTRY)
    private readonly priceSourceRegistry: IPriceSourceRegistry,
    @Optional() private readonly metricsService: MetricsService | null = null,
  ) {}

  public async getPrice(query: IPriceQuery): Promise<IPriceQuote> {
    const cachedQuote: IPriceQuote | null = this.priceCacheService.get(query);

    if (cachedQuote !== null) {
      this.recordLookup(query.kind, 'cache_hit');
      return cachedQuote;
    }

    const kind: IPriceQuery['kind'] = query.kind;

    if (!isFetchableAssetKind(kind)) {
      this.recordLookup(kind, 'unavailable');
      throw new PriceUnavailableError(
        kind,
        query.identifier,
        new UnsupportedAssetError(kind, query.identifier),
        0,
      );
    }

    const key: string = buildPriceCacheKey(query);
    const pending: Promise<IPriceQuote> | undefined = this.inFlight.get(key);

    if (pending !== undefined) {
      return pending;
    }

    const request: Promise<IPriceQuote> = this.fetchAndCache(kind, query).finally((): void => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, request);

    return request;
  }

  /** Like `getPrice`, but degrades to the last retained quote when the sources fail. */
  public async getPriceOrStale(query: IPriceQuery): Promise<IPriceLookupResult> {
    try {
      const quote: IPriceQuote = await this.getPrice(query);
      return { quote, stale: false };
    } catch (error: unknown) {
      if (!(error instanceof PriceUnavailableError)) {
        throw error;
      }

      const staleQuote: IPriceQuote | null = this.priceCacheService.getStale(query);

      if (staleQuote === null) {
        throw error;
      }

      this.logger.warn(
        `price_stale_fallback kind=${query.kind} identifier=${query.identifier} fetchedAt=${new Date(staleQuote.fetchedAtEpochMs).toISOString()}`,
      );
      this.recordLookup(query.kind, 'stale');
      return { quote: staleQuote, stale: true };
    }
  }

  private async fetchAndCache(kind: FetchableAssetKind, query: IPriceQuery): Promise<IPriceQuote> {
    const adapter: IPriceSourceAdapter = this.priceSourceRegistry.resolve(kind);
    let attempts: number = 0;

    try {
      const quote: IPriceQuote = await executeWithExponentialBackoff(
        async (attempt: number): Promise<IPriceQuote> => {
          attempts = attempt;
          return adapter.fetch(query.identifier);
        },
        {
          maxAttempts: this.appConfigService.priceFetchMaxAttempts,
          baseDelayMs: this.appConfigService.priceFetchBackoffBaseMs,
          maxDelayMs: this.appConfigService.priceFetchBackoffMaxMs,
          shouldRetry: (error: unknown): boolean => error instanceof SourceUnreachableError,
          onRetry: (error: unknown, attempt: number, delayMs: number): void => {
            this.logger.warn(
              `price_fetch_retry kind=${kind} identifier=${query.identifier} attempt=${String(attempt)} delayMs=${String(delayMs)} reason=${error instanceof Error ? error.message : String(error)}`,
            );
          },
        },
      );

      this.priceCacheService.put(query, quote, this.priceCacheService.resolveTtlMs(kind));
      this.recordLookup(kind, 'fetched');
      return quote;
    } catch (error: unknown) {
      const lastError: PriceSourceError = isPriceSourceError(error)
        ? error
        : new SourceUnreachableError(
            adapter.source,
            `unexpected: ${error instanceof Error ? error.message : String(error)}`,
          );

      if (lastError instanceof ParseFailureError) {
        this.logger.error(
          `price_parse_failure kind=${kind} identifier=${query.identifier} source=${lastError.source} reason=${lastError.message} raw=${lastError.rawSnippet}`,
        );
      } else {
        this.logger.warn(
          `price_unavailable kind=${kind} identifier=${query.identifier} attempts=${String(attempts)} reason=${lastError.message}`,
        );
      }

      this.recordLookup(kind, 'unavailable');
      throw new PriceUnavailableError(kind, query.identifier, lastError, attempts);
    }
  }

  private recordLookup(kind: string, result: LookupResult): void {
    this.metricsService?.priceLookupsTotal.inc({ kind, result });
  }
}
