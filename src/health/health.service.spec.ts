import { afterEach, describe, expect, it, vi } from 'vitest';

import { HealthController } from './health.controller';
import { HealthService } from './health.service';
import type { AppHealthStatus } from './health.types';
import type { AppConfigService } from '../config/app-config.service';
import type { DatabaseService } from '../database/kysely/database.service';
import { registerCache, SimpleCacheImpl, unregisterCache } from '../infra/cache';
import type { KeepAliveService } from '../scheduler/keep-alive.service';
import type { ISnapshotSchedulerStatus } from '../scheduler/snapshot-scheduler.interfaces';
import type { SnapshotSchedulerService } from '../scheduler/snapshot-scheduler.service';

type DatabaseServiceStub = {
  readonly healthCheck: ReturnType<typeof vi.fn>;
};

type SchedulerStub = {
  readonly getStatus: ReturnType<typeof vi.fn>;
};

type KeepAliveStub = {
  readonly isRunning: ReturnType<typeof vi.fn>;
};

const SCHEDULER_STATUS: ISnapshotSchedulerStatus = {
  state: 'idle',
  nextFireAtIso: '2026-03-02T14:58:00.000Z',
  lastRun: null,
};

const createService = (databaseOk: boolean, keepAliveRunning: boolean): HealthService => {
  const databaseServiceStub: DatabaseServiceStub = {
    healthCheck: vi.fn().mockResolvedValue(databaseOk),
  };
  const schedulerStub: SchedulerStub = {
    getStatus: vi.fn().mockReturnValue(SCHEDULER_STATUS),
  };
  const keepAliveStub: KeepAliveStub = {
    isRunning: vi.fn().mockReturnValue(keepAliveRunning),
  };

  return new HealthService(
    { appVersion: '1.2.0' } as unknown as AppConfigService,
    databaseServiceStub as unknown as DatabaseService,
    schedulerStub as unknown as SnapshotSchedulerService,
    keepAliveStub as unknown as KeepAliveService,
  );
};

describe('HealthService', (): void => {
  afterEach((): void => {
    unregisterCache('health_test');
  });

  it('reports ok with scheduler status and cache stats', async (): Promise<void> => {
    const cache: SimpleCacheImpl<number> = new SimpleCacheImpl<number>({ ttlSec: 60 });
    registerCache('health_test', cache);
    cache.set('k', 1);
    const service: HealthService = createService(true, true);

    const status: AppHealthStatus = await service.getHealthStatus();

    expect(status.status).toBe('ok');
    expect(status.version).toBe('1.2.0');
    expect(status.database).toEqual({ ok: true, details: 'reachable' });
    expect(status.scheduler).toEqual(SCHEDULER_STATUS);
    expect(status.keepAlive).toEqual({ ok: true, details: 'running' });
    expect(status.caches['health_test']).toEqual({ keys: 1, hits: 0, misses: 0 });
  });

  it('reports degraded when the database is unreachable', async (): Promise<void> => {
    const service: HealthService = createService(false, false);

    const status: AppHealthStatus = await service.getHealthStatus();

    expect(status.status).toBe('degraded');
    expect(status.database).toEqual({ ok: false, details: 'unreachable' });
    expect(status.keepAlive).toEqual({ ok: true, details: 'disabled by KEEP_ALIVE_URL unset' });
  });
});

describe('HealthController', (): void => {
  it('answers ping with pong', (): void => {
    const controller: HealthController = new HealthController(createService(true, false));

    expect(controller.ping()).toBe('pong');
  });
});
