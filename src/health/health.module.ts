import { Module } from '@nestjs/common';

import { HealthController } from './health.controller';
import { HealthService } from './health.service';
import { DatabaseModule } from '../database/database.module';
import { SchedulerModule } from '../scheduler/scheduler.module';

@Module({
  imports: [DatabaseModule, SchedulerModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
