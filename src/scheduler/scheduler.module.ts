import { Module } from '@nestjs/common';

import { KeepAliveService } from './keep-alive.service';
import { SnapshotSchedulerService } from './snapshot-scheduler.service';
import { DatabaseModule } from '../database/database.module';
import { ObservabilityModule } from '../observability/observability.module';
import { PricingModule } from '../pricing/pricing.module';

@Module({
  imports: [PricingModule, DatabaseModule, ObservabilityModule],
  providers: [SnapshotSchedulerService, KeepAliveService],
  exports: [SnapshotSchedulerService, KeepAliveService],
})
export class SchedulerModule {}
