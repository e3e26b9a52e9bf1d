import { Injectable, type OnModuleDestroy } from '@nestjs/common';

import { type IPriceCacheEntry, PRICE_QUOTE_CACHE_NAME } from './price-cache.interfaces';
import {
  AssetKind,
  type FetchableAssetKind,
} from '../common/interfaces/pricing/asset-kind.interfaces';
import type { IPriceQuery, IPriceQuote } from '../common/interfaces/pricing/price-quote.interfaces';
import { AppConfigService } from '../config/app-config.service';
import { SimpleCacheImpl, registerCache, unregisterCache } from '../infra/cache';
import { normalizeSecuritiesCode } from '../integrations/price-sources/equity/jp-equity-price.adapter';
import { resolveFundListing } from '../integrations/price-sources/fund/fund-nav.adapter';

// Spellings one adapter treats as the same asset share a key.
const canonicalizeIdentifier = (query: IPriceQuery): string => {
  const folded: string = query.identifier.normalize('NFKC').trim().toUpperCase();

  switch (query.kind) {
    case AssetKind.JP_STOCK:
      return normalizeSecuritiesCode(folded) ?? folded;
    case AssetKind.FUND:
      return resolveFundListing(folded)?.name.toUpperCase() ?? folded;
    default:
      return folded;
  }
};

export const buildPriceCacheKey = (query: IPriceQuery): string =>
  `${query.kind}:${canonicalizeIdentifier(query)}`;

/**
 * Quotes keyed by kind and identifier. An entry is fresh until its own
 * `expiresAtEpochMs`; after that it is only served by `getStale` until the
 * retention window drops it from the underlying store.
 */
@Injectable()
export class PriceCacheService implements OnModuleDestroy {
  private readonly cache: SimpleCacheImpl<IPriceCacheEntry>;
  private readonly staleRetentionSec: number;

  public constructor(private readonly appConfigService: AppConfigService) {
    this.staleRetentionSec = this.appConfigService.priceCacheStaleRetentionSec;
    this.cache = new SimpleCacheImpl<IPriceCacheEntry>({
      ttlSec: this.staleRetentionSec,
      maxKeys: this.appConfigService.priceCacheMaxEntries,
    });
    registerCache(PRICE_QUOTE_CACHE_NAME, this.cache);
  }

  public onModuleDestroy(): void {
    unregisterCache(PRICE_QUOTE_CACHE_NAME);
    this.cache.flush();
  }

  public get(query: IPriceQuery): IPriceQuote | null {
    const entry: IPriceCacheEntry | undefined = this.cache.get(buildPriceCacheKey(query));

    if (entry === undefined || Date.now() >= entry.expiresAtEpochMs) {
      return null;
    }

    return entry.quote;
  }

  public getStale(query: IPriceQuery): IPriceQuote | null {
    return this.cache.get(buildPriceCacheKey(query))?.quote ?? null;
  }

  public put(query: IPriceQuery, quote: IPriceQuote, ttlMs: number): void {
    const entry: IPriceCacheEntry = Object.freeze({
      query: Object.freeze({ kind: query.kind, identifier: query.identifier }),
      quote: Object.freeze({ ...quote }),
      expiresAtEpochMs: Date.now() + ttlMs,
    });
    const retentionSec: number = Math.max(this.staleRetentionSec, Math.ceil(ttlMs / 1000));

    this.cache.set(buildPriceCacheKey(query), entry, retentionSec);
  }

  public resolveTtlMs(kind: FetchableAssetKind): number {
    return this.resolveTtlSec(kind) * 1000;
  }

  private resolveTtlSec(kind: FetchableAssetKind): number {
    switch (kind) {
      case AssetKind.JP_STOCK:
        return this.appConfigService.priceCacheTtlJpStockSec;
      case AssetKind.US_STOCK:
        return this.appConfigService.priceCacheTtlUsStockSec;
      case AssetKind.GOLD:
        return this.appConfigService.priceCacheTtlGoldSec;
      case AssetKind.CRYPTO:
        return this.appConfigService.priceCacheTtlCryptoSec;
      case AssetKind.FUND:
        return this.appConfigService.priceCacheTtlFundSec;
    }
  }
}
