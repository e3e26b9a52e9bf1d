import type { ICacheStats } from '../infra/cache';
import type { ISnapshotSchedulerStatus } from '../scheduler/snapshot-scheduler.interfaces';

export type ComponentHealth = {
  readonly ok: boolean;
  readonly details: string;
};

export type AppHealthStatus = {
  readonly status: 'ok' | 'degraded';
  readonly version: string;
  readonly database: ComponentHealth;
  readonly scheduler: ISnapshotSchedulerStatus;
  readonly keepAlive: ComponentHealth;
  readonly caches: Readonly<Record<string, ICacheStats>>;
};
