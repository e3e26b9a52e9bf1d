import { Module } from '@nestjs/common';

import { ConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { HealthModule } from './health/health.module';
import { ObservabilityModule } from './observability/observability.module';
import { PricingModule } from './pricing/pricing.module';
import { SchedulerModule } from './scheduler/scheduler.module';

@Module({
  imports: [
    ConfigModule,
    DatabaseModule,
    PricingModule,
    SchedulerModule,
    HealthModule,
    ObservabilityModule,
  ],
})
export class AppModule {}
