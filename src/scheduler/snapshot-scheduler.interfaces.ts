export type SnapshotTrigger = 'scheduled' | 'manual';

export type SnapshotSchedulerState = 'stopped' | 'idle' | 'running';

export interface ISnapshotRunSummary {
  readonly runId: string;
  readonly trigger: SnapshotTrigger;
  readonly asOfDate: string;
  readonly startedAtIso: string;
  readonly durationMs: number;
  readonly trackedAssets: number;
  readonly written: number;
  readonly fetchFailed: number;
  readonly writeFailed: number;
  readonly timedOut: boolean;
}

export interface ISnapshotSchedulerStatus {
  readonly state: SnapshotSchedulerState;
  readonly nextFireAtIso: string | null;
  readonly lastRun: ISnapshotRunSummary | null;
}
