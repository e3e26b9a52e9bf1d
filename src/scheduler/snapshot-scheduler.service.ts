import { randomUUID } from 'node:crypto';

import {
  Inject,
  Injectable,
  Logger,
  Optional,
  type OnModuleDestroy,
  type OnModuleInit,
} from '@nestjs/common';
import Bottleneck from 'bottleneck';

import { formatZonedDate, resolveNextDailyFireAt } from './daily-trigger.util';
import { type ISnapshotAsset, selectSnapshotAssets } from './snapshot-assets.util';
import type {
  ISnapshotRunSummary,
  ISnapshotSchedulerStatus,
  SnapshotSchedulerState,
  SnapshotTrigger,
} from './snapshot-scheduler.interfaces';
import type { IPriceQuote } from '../common/interfaces/pricing/price-quote.interfaces';
import {
  type IPortfolioSnapshotStore,
  type ITrackedAsset,
  PORTFOLIO_SNAPSHOT_STORE,
} from '../common/interfaces/storage/portfolio-snapshot-store.interfaces';
import { AppConfigService } from '../config/app-config.service';
import { MetricsService } from '../observability/metrics.service';
import { PriceService } from '../pricing/price.service';

interface IFetchedSnapshotQuote {
  readonly asset: ISnapshotAsset;
  readonly quote: IPriceQuote;
}

interface IFetchPhaseResult {
  readonly fetched: readonly IFetchedSnapshotQuote[];
  readonly failed: number;
  readonly timedOut: boolean;
}

interface IWritePhaseResult {
  readonly written: number;
  readonly writeFailed: number;
  readonly timedOut: boolean;
}

const RUN_TIMEOUT_REASON = 'run_timeout';
const DEADLINE_PASSED: unique symbol = Symbol('DEADLINE_PASSED');

/**
 * Daily portfolio snapshot. The timer is re-armed from the wall clock on every
 * fire. A trigger while a run is active is dropped, and a scheduled fire for a
 * date that already had a scheduled run is skipped. A scheduled run is dated by
 * the slot it was armed for, so a fire delayed past midnight keeps its own day.
 *
 * Listing and fetching share `SNAPSHOT_RUN_TIMEOUT_MS`; writing the fetched
 * quotes gets a budget of the same length.
 */
@Injectable()
export class SnapshotSchedulerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger: Logger = new Logger(SnapshotSchedulerService.name);
  private timerHandle: ReturnType<typeof setTimeout> | null = null;
  private started: boolean = false;
  private runInProgress: boolean = false;
  private nextFireAtMs: number | null = null;
  private lastScheduledRunDate: string | null = null;
  private lastRun: ISnapshotRunSummary | null = null;

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly priceService: PriceService,
    @Inject(PORTFOLIO_SNAPSHOT_STORE)
    private readonly snapshotStore: IPortfolioSnapshotStore,
    @Optional() private readonly metricsService: MetricsService | null = null,
  ) {}

  public onModuleInit(): void {
    if (!this.appConfigService.snapshotEnabled) {
      this.logger.log('snapshot_scheduler_disabled');
      return;
    }

    this.start();
  }

  public onModuleDestroy(): void {
    this.stop();
  }

  public start(): void {
    if (this.started) {
      return;
    }

    this.started = true;
    this.armNextFire();
  }

  public stop(): void {
    this.started = false;
    this.nextFireAtMs = null;

    if (this.timerHandle !== null) {
      clearTimeout(this.timerHandle);
      this.timerHandle = null;
    }
  }

  public getStatus(): ISnapshotSchedulerStatus {
    return {
      state: this.resolveState(),
      nextFireAtIso: this.nextFireAtMs === null ? null : new Date(this.nextFireAtMs).toISOString(),
      lastRun: this.lastRun,
    };
  }

  /**
   * Resolves `null` when the run was skipped or failed before producing a summary.
   * `slotEpochMs` is the instant the run stands for and decides its calendar date.
   */
  public async runSnapshot(
    trigger: SnapshotTrigger,
    slotEpochMs: number = Date.now(),
  ): Promise<ISnapshotRunSummary | null> {
    if (this.runInProgress) {
      this.logger.warn(`snapshot_run_skip trigger=${trigger} reason=already_running`);
      this.metricsService?.snapshotRunsTotal.inc({ trigger, status: 'skipped' });
      return null;
    }

    const startedAtMs: number = Date.now();
    const asOfDate: string = formatZonedDate(slotEpochMs, this.appConfigService.snapshotTimezone);

    if (trigger === 'scheduled' && this.lastScheduledRunDate === asOfDate) {
      this.logger.warn(`snapshot_run_skip trigger=${trigger} reason=already_ran date=${asOfDate}`);
      this.metricsService?.snapshotRunsTotal.inc({ trigger, status: 'skipped' });
      return null;
    }

    this.runInProgress = true;

    if (trigger === 'scheduled') {
      this.lastScheduledRunDate = asOfDate;
    }

    try {
      const summary: ISnapshotRunSummary = await this.executeRun(trigger, startedAtMs, asOfDate);
      this.lastRun = summary;
      this.recordRun(summary);
      this.logger.log(
        `snapshot_run_done runId=${summary.runId} trigger=${trigger} date=${asOfDate} assets=${String(summary.trackedAssets)} written=${String(summary.written)} fetchFailed=${String(summary.fetchFailed)} writeFailed=${String(summary.writeFailed)} timedOut=${String(summary.timedOut)} durationMs=${String(summary.durationMs)}`,
      );
      return summary;
    } catch (error: unknown) {
      this.logger.error(
        `snapshot_run_failed trigger=${trigger} date=${asOfDate} reason=${error instanceof Error ? error.message : String(error)}`,
      );
      this.metricsService?.snapshotRunsTotal.inc({ trigger, status: 'failed' });
      return null;
    } finally {
      this.runInProgress = false;
    }
  }

  private armNextFire(): void {
    const nowMs: number = Date.now();
    const fireAtMs: number = resolveNextDailyFireAt(
      nowMs,
      this.appConfigService.snapshotTime,
      this.appConfigService.snapshotTimezone,
    );

    this.nextFireAtMs = fireAtMs;
    this.timerHandle = setTimeout((): void => {
      this.timerHandle = null;
      void this.handleTimerFire();
    }, fireAtMs - nowMs);
    this.logger.log(`snapshot_scheduler_armed nextFireAt=${new Date(fireAtMs).toISOString()}`);
  }

  private async handleTimerFire(): Promise<void> {
    if (!this.started) {
      return;
    }

    const slotEpochMs: number = this.nextFireAtMs ?? Date.now();
    this.armNextFire();
    await this.runSnapshot('scheduled', slotEpochMs);
  }

  private async executeRun(
    trigger: SnapshotTrigger,
    startedAtMs: number,
    asOfDate: string,
  ): Promise<ISnapshotRunSummary> {
    const runId: string = randomUUID();
    const fetchDeadlineMs: number = startedAtMs + this.appConfigService.snapshotRunTimeoutMs;
    this.logger.log(`snapshot_run_start runId=${runId} trigger=${trigger} date=${asOfDate}`);

    const trackedAssets: readonly ITrackedAsset[] | typeof DEADLINE_PASSED =
      await this.raceDeadline(this.snapshotStore.listTrackedAssets(), fetchDeadlineMs);

    if (trackedAssets === DEADLINE_PASSED) {
      throw new Error(`${RUN_TIMEOUT_REASON} while listing tracked assets`);
    }

    const assets: readonly ISnapshotAsset[] = selectSnapshotAssets(trackedAssets);
    const fetchResult: IFetchPhaseResult = await this.fetchQuotes(runId, assets, fetchDeadlineMs);
    const writeResult: IWritePhaseResult = await this.writeSnapshots(
      runId,
      asOfDate,
      startedAtMs,
      fetchResult.fetched,
    );

    return {
      runId,
      trigger,
      asOfDate,
      startedAtIso: new Date(startedAtMs).toISOString(),
      durationMs: Date.now() - startedAtMs,
      trackedAssets: assets.length,
      written: writeResult.written,
      fetchFailed: fetchResult.failed,
      writeFailed: writeResult.writeFailed,
      timedOut: fetchResult.timedOut || writeResult.timedOut,
    };
  }

  private async fetchQuotes(
    runId: string,
    assets: readonly ISnapshotAsset[],
    deadlineMs: number,
  ): Promise<IFetchPhaseResult> {
    const pool: Bottleneck = new Bottleneck({
      maxConcurrent: this.appConfigService.snapshotConcurrency,
    });
    const fetched: IFetchedSnapshotQuote[] = [];
    const settledIds: Set<number> = new Set<number>();
    let failed: number = 0;
    let phaseOpen: boolean = true;

    const jobs: Promise<void>[] = assets.map(
      async (asset: ISnapshotAsset): Promise<void> =>
        pool
          .schedule(
            async (): Promise<IPriceQuote> =>
              this.priceService.getPrice({ kind: asset.kind, identifier: asset.identifier }),
          )
          .then(
            (quote: IPriceQuote): void => {
              if (phaseOpen) {
                settledIds.add(asset.userAssetId);
                fetched.push({ asset, quote });
              }
            },
            (error: unknown): void => {
              if (phaseOpen) {
                settledIds.add(asset.userAssetId);
                failed += 1;
                this.reportAssetFailure(
                  runId,
                  asset,
                  error instanceof Error ? error.message : String(error),
                );
              }
            },
          ),
    );

    const timedOut: boolean =
      (await this.raceDeadline(Promise.all(jobs), deadlineMs)) === DEADLINE_PASSED;
    phaseOpen = false;

    if (timedOut) {
      for (const asset of assets) {
        if (!settledIds.has(asset.userAssetId)) {
          failed += 1;
          this.reportAssetFailure(runId, asset, RUN_TIMEOUT_REASON);
        }
      }
    }

    void pool.stop({ dropWaitingJobs: true }).catch((error: unknown): void => {
      this.logger.warn(
        `snapshot_pool_stop_failed runId=${runId} reason=${error instanceof Error ? error.message : String(error)}`,
      );
    });

    return { fetched, failed, timedOut };
  }

  private async writeSnapshots(
    runId: string,
    asOfDate: string,
    takenAtEpochMs: number,
    fetched: readonly IFetchedSnapshotQuote[],
  ): Promise<IWritePhaseResult> {
    const deadlineMs: number = Date.now() + this.appConfigService.snapshotRunTimeoutMs;
    let written: number = 0;
    let writeFailed: number = 0;

    for (const [index, { asset, quote }] of fetched.entries()) {
      try {
        const outcome: void | typeof DEADLINE_PASSED = await this.raceDeadline(
          this.snapshotStore.writeSnapshot({
            runId,
            asOfDate,
            userAssetId: asset.userAssetId,
            quote,
            takenAtEpochMs,
          }),
          deadlineMs,
        );

        if (outcome === DEADLINE_PASSED) {
          const unwritten: number = fetched.length - index;
          writeFailed += unwritten;
          this.metricsService?.snapshotAssetsTotal.inc({ result: 'write_failed' }, unwritten);
          this.logger.warn(
            `snapshot_write_failed runId=${runId} userAssetId=${String(asset.userAssetId)} unwritten=${String(unwritten)} reason=${RUN_TIMEOUT_REASON}`,
          );
          return { written, writeFailed, timedOut: true };
        }

        written += 1;
        this.metricsService?.snapshotAssetsTotal.inc({ result: 'written' });
      } catch (error: unknown) {
        writeFailed += 1;
        this.metricsService?.snapshotAssetsTotal.inc({ result: 'write_failed' });
        this.logger.warn(
          `snapshot_write_failed runId=${runId} userAssetId=${String(asset.userAssetId)} reason=${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    return { written, writeFailed, timedOut: false };
  }

  /**
   * Settles with `work`, or with `DEADLINE_PASSED` once `deadlineMs` is reached.
   * Work still pending at the deadline is left running; its outcome is ignored.
   */
  private async raceDeadline<T>(
    work: Promise<T>,
    deadlineMs: number,
  ): Promise<T | typeof DEADLINE_PASSED> {
    let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
    const deadline: Promise<typeof DEADLINE_PASSED> = new Promise<typeof DEADLINE_PASSED>(
      (resolve: (value: typeof DEADLINE_PASSED) => void): void => {
        timeoutHandle = setTimeout(
          (): void => {
            resolve(DEADLINE_PASSED);
          },
          Math.max(0, deadlineMs - Date.now()),
        );
      },
    );

    try {
      return await Promise.race([work, deadline]);
    } finally {
      clearTimeout(timeoutHandle);
    }
  }

  private reportAssetFailure(runId: string, asset: ISnapshotAsset, reason: string): void {
    this.metricsService?.snapshotAssetsTotal.inc({ result: 'fetch_failed' });
    this.logger.warn(
      `snapshot_asset_failed runId=${runId} userAssetId=${String(asset.userAssetId)} kind=${asset.kind} identifier=${asset.identifier} reason=${reason}`,
    );
  }

  private recordRun(summary: ISnapshotRunSummary): void {
    const status: string = summary.timedOut
      ? 'timed_out'
      : summary.fetchFailed + summary.writeFailed > 0
        ? 'partial'
        : 'completed';

    this.metricsService?.snapshotRunsTotal.inc({ trigger: summary.trigger, status });
    this.metricsService?.snapshotRunDurationSeconds.observe(summary.durationMs / 1000);
  }

  private resolveState(): SnapshotSchedulerState {
    if (this.runInProgress) {
      return 'running';
    }

    return this.started ? 'idle' : 'stopped';
  }
}
