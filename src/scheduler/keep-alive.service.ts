import {
  Injectable,
  Logger,
  Optional,
  type OnModuleDestroy,
  type OnModuleInit,
} from '@nestjs/common';

import { AppConfigService } from '../config/app-config.service';
import { MetricsService } from '../observability/metrics.service';

const PING_PATH = '/ping';

/** Periodic GET against the public URL so an idling host keeps the process awake. */
@Injectable()
export class KeepAliveService implements OnModuleInit, OnModuleDestroy {
  private readonly logger: Logger = new Logger(KeepAliveService.name);
  private intervalHandle: ReturnType<typeof setInterval> | null = null;

  public constructor(
    private readonly appConfigService: AppConfigService,
    @Optional() private readonly metricsService: MetricsService | null = null,
  ) {}

  public onModuleInit(): void {
    const baseUrl: string | null = this.appConfigService.keepAliveUrl;

    if (baseUrl === null) {
      this.logger.log('keep_alive_disabled reason=no_url');
      return;
    }

    const intervalMs: number = this.appConfigService.keepAliveIntervalSec * 1000;
    this.intervalHandle = setInterval((): void => {
      void this.ping(baseUrl);
    }, intervalMs);
    this.logger.log(`keep_alive_started url=${baseUrl}${PING_PATH} intervalMs=${String(intervalMs)}`);
  }

  public onModuleDestroy(): void {
    if (this.intervalHandle !== null) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
  }

  public isRunning(): boolean {
    return this.intervalHandle !== null;
  }

  /** Resolves `false` on any failure; never rejects. */
  public async ping(baseUrl: string): Promise<boolean> {
    const url: string = `${baseUrl}${PING_PATH}`;

    try {
      const response: Response = await fetch(url, {
        method: 'GET',
        signal: AbortSignal.timeout(this.appConfigService.keepAliveTimeoutMs),
      });

      if (!response.ok) {
        this.recordFailure(url, `HTTP ${String(response.status)}`);
        return false;
      }

      this.metricsService?.keepAlivePingsTotal.inc({ status: 'ok' });
      this.logger.debug(`keep_alive_ping_ok url=${url}`);
      return true;
    } catch (error: unknown) {
      this.recordFailure(url, error instanceof Error ? error.message : String(error));
      return false;
    }
  }

  private recordFailure(url: string, reason: string): void {
    this.metricsService?.keepAlivePingsTotal.inc({ status: 'failed' });
    this.logger.warn(`keep_alive_ping_failed url=${url} reason=${reason}`);
  }
}
