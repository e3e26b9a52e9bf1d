import type { FetchableAssetKind } from './asset-kind.interfaces';
import type { IPriceQuote } from './price-quote.interfaces';

export const PRICE_SOURCE_REGISTRY: unique symbol = Symbol('PRICE_SOURCE_REGISTRY');

/**
 * One external source for one asset kind. Implementations reject with
 * SourceUnreachableError, ParseFailureError or UnsupportedAssetError and never retry.
 */
export interface IPriceSourceAdapter<K extends FetchableAssetKind = FetchableAssetKind> {
  readonly kind: K;
  readonly source: string;
  fetch(identifier: string): Promise<IPriceQuote>;
}

export type PriceSourceTable = {
  readonly [K in FetchableAssetKind]: IPriceSourceAdapter<K>;
};

export interface IPriceSourceRegistry {
  resolve(kind: FetchableAssetKind): IPriceSourceAdapter;
}
