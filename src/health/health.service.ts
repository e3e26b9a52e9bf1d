import { Injectable } from '@nestjs/common';

import type { AppHealthStatus, ComponentHealth } from './health.types';
import { AppConfigService } from '../config/app-config.service';
import { DatabaseService } from '../database/kysely/database.service';
import { getAllCacheStats, type ICacheStats } from '../infra/cache';
import { KeepAliveService } from '../scheduler/keep-alive.service';
import { SnapshotSchedulerService } from '../scheduler/snapshot-scheduler.service';

@Injectable()
export class HealthService {
  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly databaseService: DatabaseService,
    private readonly snapshotSchedulerService: SnapshotSchedulerService,
    private readonly keepAliveService: KeepAliveService,
  ) {}

  public async getHealthStatus(): Promise<AppHealthStatus> {
    const databaseOk: boolean = await this.databaseService.healthCheck();
    const database: ComponentHealth = {
      ok: databaseOk,
      details: databaseOk ? 'reachable' : 'unreachable',
    };

    // Keep-alive is optional, so a disabled pinger does not degrade the process.
    const keepAlive: ComponentHealth = {
      ok: true,
      details: this.keepAliveService.isRunning() ? 'running' : 'disabled by KEEP_ALIVE_URL unset',
    };

    const caches: Record<string, ICacheStats> = {};

    for (const [name, stats] of getAllCacheStats()) {
      caches[name] = stats;
    }

    return {
      status: database.ok ? 'ok' : 'degraded',
      version: this.appConfigService.appVersion,
      database,
      scheduler: this.snapshotSchedulerService.getStatus(),
      keepAlive,
      caches,
    };
  }
}
