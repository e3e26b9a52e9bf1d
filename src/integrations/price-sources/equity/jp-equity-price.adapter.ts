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

const QUOTE_CURRENCY: QuoteCurrency = 'JPY';
const TOKYO_EXCHANGE_SUFFIX = '.T';
const SECURITIES_CODE_PATTERN: RegExp = /^\d{3}[0-9A-Z]$/;

/** Tokyo listed equities. Accepts `7203`, `130A` and the suffixed form `7203.T`. */
@Injectable()
export class JpEquityPriceAdapter implements IPriceSourceAdapter<AssetKind.JP_STOCK> {
  public readonly kind: AssetKind.JP_STOCK = AssetKind.JP_STOCK;
  public readonly source: string = EQUITY_CHART_SOURCE;

  public constructor(private readonly chartClient: EquityChartClient) {}

  public async fetch(identifier: string): Promise<IPriceQuote> {
    const code: string | null = normalizeSecuritiesCode(identifier);

    if (code === null) {
      throw new UnsupportedAssetError(this.kind, identifier);
    }

    const meta: IChartMeta | null = await this.chartClient.fetchChartMeta(
      `${code}${TOKYO_EXCHANGE_SUFFIX}`,
    );

    if (meta === null) {
      throw new UnsupportedAssetError(this.kind, identifier);
    }

    assertChartCurrency(meta, QUOTE_CURRENCY);

    return {
      kind: this.kind,
      identifier: code,
      currentPrice: meta.regularMarketPrice,
      previousClose: meta.previousClose,
      currency: QUOTE_CURRENCY,
      displayName: meta.displayName,
      fetchedAtEpochMs: Date.now(),
      source: this.source,
    };
  }
}

export const normalizeSecuritiesCode = (identifier: string): string | null => {
  let code: string = identifier.trim().toUpperCase();

  if (code.endsWith(TOKYO_EXCHANGE_SUFFIX)) {
    code = code.slice(0, -TOKYO_EXCHANGE_SUFFIX.length);
  }

  return SECURITIES_CODE_PATTERN.test(code) ? code : null;
};
