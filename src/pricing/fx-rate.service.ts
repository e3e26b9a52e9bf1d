import { Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';

import type { IFxRateResult } from '../common/interfaces/pricing/price-quote.interfaces';
import { AppConfigService } from '../config/app-config.service';
import { SimpleCacheImpl, registerCache, unregisterCache } from '../infra/cache';
import {
  EQUITY_CHART_SOURCE,
  EquityChartClient,
} from '../integrations/price-sources/equity/equity-chart.client';
import type { IChartMeta } from '../integrations/price-sources/equity/equity-chart.interfaces';
import { RequestPriority } from '../rate-limiting/bottleneck-rate-limiter.interfaces';

export const FX_RATE_CACHE_NAME = 'fx_rates';
export const USD_JPY_SYMBOL = 'JPY=X';
export const FX_FALLBACK_SOURCE = 'configured_fallback';

/** USD/JPY used to value dollar holdings in yen. Never rejects. */
@Injectable()
export class FxRateService implements OnModuleDestroy {
  private readonly logger: Logger = new Logger(FxRateService.name);
  private readonly cache: SimpleCacheImpl<number>;

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly chartClient: EquityChartClient,
  ) {
    this.cache = new SimpleCacheImpl<number>({
      ttlSec: this.appConfigService.fxRateCacheTtlSec,
      maxKeys: 1,
    });
    registerCache(FX_RATE_CACHE_NAME, this.cache);
  }

  public onModuleDestroy(): void {
    unregisterCache(FX_RATE_CACHE_NAME);
    this.cache.flush();
  }

  public async getUsdJpyRate(): Promise<IFxRateResult> {
    const cachedRate: number | undefined = this.cache.get(USD_JPY_SYMBOL);

    if (cachedRate !== undefined) {
      return { rate: cachedRate, source: EQUITY_CHART_SOURCE, stale: false };
    }

    try {
      const meta: IChartMeta | null = await this.chartClient.fetchChartMeta(
        USD_JPY_SYMBOL,
        RequestPriority.HIGH,
      );

      if (meta === null || meta.regularMarketPrice <= 0) {
        return this.fallback('rate not quoted');
      }

      this.cache.set(USD_JPY_SYMBOL, meta.regularMarketPrice);
      return { rate: meta.regularMarketPrice, source: EQUITY_CHART_SOURCE, stale: false };
    } catch (error: unknown) {
      return this.fallback(error instanceof Error ? error.message : String(error));
    }
  }

  private fallback(reason: string): IFxRateResult {
    const rate: number = this.appConfigService.fxRateFallbackUsdJpy;
    this.logger.warn(`fx_rate_fallback pair=USD/JPY rate=${String(rate)} reason=${reason}`);
    return { rate, source: FX_FALLBACK_SOURCE, stale: true };
  }
}
