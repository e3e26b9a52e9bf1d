import { Module } from '@nestjs/common';

import { FxRateService } from './fx-rate.service';
import { PriceCacheService } from './price-cache.service';
import { PriceService } from './price.service';
import { PriceSourcesModule } from '../integrations/price-sources/price-sources.module';
import { ObservabilityModule } from '../observability/observability.module';

@Module({
  imports: [PriceSourcesModule, ObservabilityModule],
  providers: [PriceCacheService, PriceService, FxRateService],
  exports: [PriceService, FxRateService],
})
export class PricingModule {}
