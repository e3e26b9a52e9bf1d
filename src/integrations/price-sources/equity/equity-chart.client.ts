import { Injectable } from '@nestjs/common';

import { type ChartResponse, chartResponseSchema, type IChartMeta } from './equity-chart.interfaces';
import type { QuoteCurrency } from '../../../common/interfaces/pricing/price-quote.interfaces';
import { ParseFailureError } from '../../../common/interfaces/pricing/price-source.errors';
import { AppConfigService } from '../../../config/app-config.service';
import {
  LimiterKey,
  RequestPriority,
} from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import { PriceSourceHttpClient } from '../http/price-source-http.client';

export const EQUITY_CHART_SOURCE = 'equity_chart_api';

const NOT_FOUND_ERROR_CODE = 'Not Found';

/**
 * A listing quoted in another currency than the adapter reports would be stored
 * under the wrong unit. A meta without currency is taken as the expected one.
 */
export const assertChartCurrency = (meta: IChartMeta, expected: QuoteCurrency): void => {
  if (meta.currency !== null && meta.currency.toUpperCase() !== expected) {
    throw new ParseFailureError(
      EQUITY_CHART_SOURCE,
      `unexpected currency ${meta.currency} for symbol=${meta.symbol}, expected ${expected}`,
      meta.currency,
    );
  }
};

/** Shared reader for the quote chart endpoint used by equity and FX lookups. */
@Injectable()
export class EquityChartClient {
  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly httpClient: PriceSourceHttpClient,
  ) {}

  /** Resolves `null` when the endpoint does not know the symbol. */
  public async fetchChartMeta(
    symbol: string,
    priority: RequestPriority = RequestPriority.NORMAL,
  ): Promise<IChartMeta | null> {
    const payload: unknown = await this.httpClient.fetchJson({
      source: EQUITY_CHART_SOURCE,
      limiterKey: LimiterKey.EQUITY_QUOTES,
      url: this.buildChartUrl(symbol),
      priority,
    });

    if (payload === null) {
      return null;
    }

    const parsed = chartResponseSchema.safeParse(payload);

    if (!parsed.success) {
      throw new ParseFailureError(
        EQUITY_CHART_SOURCE,
        `unexpected chart payload for symbol=${symbol}: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        JSON.stringify(payload),
      );
    }

    return this.mapChartMeta(symbol, parsed.data);
  }

  private mapChartMeta(symbol: string, response: ChartResponse): IChartMeta | null {
    if (response.chart.error?.code === NOT_FOUND_ERROR_CODE) {
      return null;
    }

    const meta = response.chart.result?.[0]?.meta;

    if (meta === undefined) {
      throw new ParseFailureError(
        EQUITY_CHART_SOURCE,
        `chart result is empty for symbol=${symbol}`,
        JSON.stringify(response.chart.error ?? {}),
      );
    }

    return {
      symbol: meta.symbol,
      currency: meta.currency ?? null,
      regularMarketPrice: meta.regularMarketPrice,
      previousClose: meta.previousClose ?? meta.chartPreviousClose ?? null,
      displayName: meta.longName ?? meta.shortName ?? null,
    };
  }

  private buildChartUrl(symbol: string): URL {
    const url: URL = new URL(
      `/v8/finance/chart/${encodeURIComponent(symbol)}`,
      this.appConfigService.equityChartApiBaseUrl,
    );
    url.searchParams.set('range', '1d');
    url.searchParams.set('interval', '1d');
    return url;
  }
}
