import { Injectable } from '@nestjs/common';

import { AssetKind } from '../../../common/interfaces/pricing/asset-kind.interfaces';
import type { IPriceQuote } from '../../../common/interfaces/pricing/price-quote.interfaces';
import { UnsupportedAssetError } from '../../../common/interfaces/pricing/price-source.errors';
import type { IPriceSourceAdapter } from '../../../common/interfaces/pricing/price-source.interfaces';
import { AppConfigService } from '../../../config/app-config.service';
import { LimiterKey } from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import { PriceSourceHttpClient } from '../http/price-source-http.client';
import type { MarkupSelector } from '../parsing/markup-extractor';
import { readScrapedAmount } from '../parsing/scraped-amount.util';

export const CRYPTO_PRICE_SOURCE = 'crypto_pair_page';

interface ICryptoPair {
  readonly pairSlug: string;
  readonly displayName: string;
}

export const SUPPORTED_CRYPTO_PAIRS: Readonly<Record<string, ICryptoPair>> = {
  BTC: { pairSlug: 'btc_jpy', displayName: 'Bitcoin' },
  ETH: { pairSlug: 'eth_jpy', displayName: 'Ethereum' },
  XRP: { pairSlug: 'xrp_jpy', displayName: 'XRP' },
  DOGE: { pairSlug: 'doge_jpy', displayName: 'Dogecoin' },
};

const CRYPTO_PRICE_SELECTORS: readonly MarkupSelector[] = [
  'div.md_price',
  'span.price',
];

@Injectable()
export class CryptoPriceAdapter implements IPriceSourceAdapter<AssetKind.CRYPTO> {
  public readonly kind: AssetKind.CRYPTO = AssetKind.CRYPTO;
  public readonly source: string = CRYPTO_PRICE_SOURCE;

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly httpClient: PriceSourceHttpClient,
  ) {}

  public async fetch(identifier: string): Promise<IPriceQuote> {
    const symbol: string = identifier.trim().toUpperCase();
    const pair: ICryptoPair | undefined = SUPPORTED_CRYPTO_PAIRS[symbol];

    if (pair === undefined) {
      throw new UnsupportedAssetError(this.kind, identifier);
    }

    const markup: string | null = await this.httpClient.fetchText({
      source: this.source,
      limiterKey: LimiterKey.CRYPTO_PRICES,
      url: new URL(`/pair/${pair.pairSlug}`, this.appConfigService.cryptoPriceBaseUrl),
    });

    if (markup === null) {
      throw new UnsupportedAssetError(this.kind, identifier);
    }

    return {
      kind: this.kind,
      identifier: symbol,
      currentPrice: readScrapedAmount(this.source, markup, CRYPTO_PRICE_SELECTORS, 'JPY'),
      previousClose: null,
      currency: 'JPY',
      displayName: pair.displayName,
      fetchedAtEpochMs: Date.now(),
      source: this.source,
    };
  }
}
