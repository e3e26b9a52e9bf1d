import { Injectable } from '@nestjs/common';

import { AssetKind } from '../../../common/interfaces/pricing/asset-kind.interfaces';
import type { IPriceQuote } from '../../../common/interfaces/pricing/price-quote.interfaces';
import { SourceUnreachableError } from '../../../common/interfaces/pricing/price-source.errors';
import type { IPriceSourceAdapter } from '../../../common/interfaces/pricing/price-source.interfaces';
import { AppConfigService } from '../../../config/app-config.service';
import { LimiterKey } from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import { PriceSourceHttpClient } from '../http/price-source-http.client';
import type { MarkupSelector } from '../parsing/markup-extractor';
import { readScrapedAmount } from '../parsing/scraped-amount.util';

export const GOLD_PRICE_SOURCE = 'metal_price_page';
export const GOLD_DISPLAY_NAME = 'Gold';

// Second row of the price table holds gold; its third data cell is the retail price per gram.
const GOLD_PRICE_SELECTORS: readonly MarkupSelector[] = [
  'table.table_main tr:nth-of-type(2) td:nth-of-type(3)',
  'td.retail_tax',
];

/** The vendor page quotes gold only, so every identifier is valued at the gold price. */
@Injectable()
export class GoldPriceAdapter implements IPriceSourceAdapter<AssetKind.GOLD> {
  public readonly kind: AssetKind.GOLD = AssetKind.GOLD;
  public readonly source: string = GOLD_PRICE_SOURCE;

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly httpClient: PriceSourceHttpClient,
  ) {}

  public async fetch(identifier: string): Promise<IPriceQuote> {
    const markup: string | null = await this.httpClient.fetchText({
      source: this.source,
      limiterKey: LimiterKey.METAL_PRICES,
      url: new URL(this.appConfigService.goldPriceUrl),
    });

    if (markup === null) {
      throw new SourceUnreachableError(this.source, 'not_found: HTTP 404', 404);
    }

    return {
      kind: this.kind,
      identifier: identifier.trim(),
      currentPrice: readScrapedAmount(this.source, markup, GOLD_PRICE_SELECTORS, 'JPY'),
      previousClose: null,
      currency: 'JPY',
      displayName: GOLD_DISPLAY_NAME,
      fetchedAtEpochMs: Date.now(),
      source: this.source,
    };
  }
}
