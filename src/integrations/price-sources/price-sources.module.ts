import { Module } from '@nestjs/common';

import { CryptoPriceAdapter } from './crypto/crypto-price.adapter';
import { EquityChartClient } from './equity/equity-chart.client';
import { JpEquityPriceAdapter } from './equity/jp-equity-price.adapter';
import { UsEquityPriceAdapter } from './equity/us-equity-price.adapter';
import { FundNavAdapter } from './fund/fund-nav.adapter';
import { PriceSourceHttpClient } from './http/price-source-http.client';
import { GoldPriceAdapter } from './metal/gold-price.adapter';
import { PriceSourceRegistry } from './price-source.registry';
import { PRICE_SOURCE_REGISTRY } from '../../common/interfaces/pricing/price-source.interfaces';
import { ObservabilityModule } from '../../observability/observability.module';
import { RateLimitingModule } from '../../rate-limiting/rate-limiting.module';

@Module({
  imports: [RateLimitingModule, ObservabilityModule],
  providers: [
    PriceSourceHttpClient,
    EquityChartClient,
    JpEquityPriceAdapter,
    UsEquityPriceAdapter,
    GoldPriceAdapter,
    CryptoPriceAdapter,
    FundNavAdapter,
    PriceSourceRegistry,
    {
      provide: PRICE_SOURCE_REGISTRY,
      useExisting: PriceSourceRegistry,
    },
  ],
  exports: [PRICE_SOURCE_REGISTRY, EquityChartClient],
})
export class PriceSourcesModule {}
