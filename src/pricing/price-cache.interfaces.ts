import type { IPriceQuery, IPriceQuote } from '../common/interfaces/pricing/price-quote.interfaces';

export const PRICE_QUOTE_CACHE_NAME = 'price_quotes';

export interface IPriceCacheEntry {
  readonly query: IPriceQuery;
  readonly quote: IPriceQuote;
  readonly expiresAtEpochMs: number;
}
