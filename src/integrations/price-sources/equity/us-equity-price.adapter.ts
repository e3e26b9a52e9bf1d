import { Injectable } from '@nestjs/common';

import { assertChartCurrency, EQUITY_CHART_SOURCE, EquityChartClient } from './equity-chart.client';
import type { IChartMeta } from './equity-chart.interfaces';
import { AssetKind } from '../../../common/interfaces/pricing/asset-kind.interfaces';
import type {
  IPriceQuote,
  QuoteCurrency,
} from '../../../common/interfaces/pricing/price-quote.interfaces';
import { UnsupportedAssetError } from '../../../common/interfaces/pricing/price-source.errors';
import type { IPriceSourceAdapter } from '../../../common/interfaces/pricing/price-source.interfaces';

const QUOTE_CURRENCY: QuoteCurrency = 'USD';
const TICKER_PATTERN: RegExp = /^[A-Z][A-Z0-9.-]{0,9}$/;

@Injectable()
export class UsEquityPriceAdapter implements IPriceSourceAdapter<AssetKind.US_STOCK> {
  public readonly kind: AssetKind.US_STOCK = AssetKind.US_STOCK;
  public readonly source: string = EQUITY_CHART_SOURCE;

  public constructor(private readonly chartClient: EquityChartClient) {}

  public async fetch(identifier: string): Promise<IPriceQuote> {
    const ticker: string = identifier.trim().toUpperCase();

    if (!TICKER_PATTERN.test(ticker)) {
      throw new UnsupportedAssetError(this.kind, identifier);
    }

    const meta: IChartMeta | null = await this.chartClient.fetchChartMeta(ticker);

    if (meta === null) {
      throw new UnsupportedAssetError(this.kind, identifier);
    }

    assertChartCurrency(meta, QUOTE_CURRENCY);

    return {
      kind: this.kind,
      identifier: ticker,
      currentPrice: meta.regularMarketPrice,
      previousClose: meta.previousClose,
      currency: QUOTE_CURRENCY,
      displayName: meta.displayName,
      fetchedAtEpochMs: Date.now(),
      source: this.source,
    };
  }
}
