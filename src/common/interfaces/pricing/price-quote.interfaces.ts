import type { AssetKind, FetchableAssetKind } from './asset-kind.interfaces';

export type QuoteCurrency = 'JPY' | 'USD';

export interface IPriceQuery {
  readonly kind: AssetKind;
  readonly identifier: string;
}

export interface IPriceQuote {
  readonly kind: FetchableAssetKind;
  readonly identifier: string;
  readonly currentPrice: number;
  readonly previousClose: number | null;
  readonly currency: QuoteCurrency;
  readonly displayName: string | null;
  readonly fetchedAtEpochMs: number;
  readonly source: string;
}

export interface IPriceLookupResult {
  readonly quote: IPriceQuote;
  readonly stale: boolean;
}

export interface IFxRateResult {
  readonly rate: number;
  readonly source: string;
  readonly stale: boolean;
}
