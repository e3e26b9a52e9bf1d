import { Injectable, Logger, Optional } from '@nestjs/common';

import {
  ParseFailureError,
  SourceUnreachableError,
} from '../../../common/interfaces/pricing/price-source.errors';
import { AppConfigService } from '../../../config/app-config.service';
import { MetricsService } from '../../../observability/metrics.service';
import {
  type LimiterKey,
  RequestPriority,
} from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from '../../../rate-limiting/bottleneck-rate-limiter.service';

const HTTP_STATUS_NOT_FOUND = 404;
const HTTP_STATUS_TOO_MANY_REQUESTS = 429;

export interface IPriceSourceRequest {
  readonly source: string;
  readonly limiterKey: LimiterKey;
  readonly url: URL;
  readonly priority?: RequestPriority;
}

type RequestStatus = 'ok' | 'not_found' | 'rate_limited' | 'http_error' | 'timeout' | 'network_error';

/**
 * Outbound GET for price sources. Every request waits on the source's rate
 * limiter and carries an abort timeout. A 404 resolves to `null` so adapters can
 * report the identifier as unsupported; every other failure is a SourceUnreachableError.
 */
@Injectable()
export class PriceSourceHttpClient {
  private readonly logger: Logger = new Logger(PriceSourceHttpClient.name);

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly rateLimiterService: BottleneckRateLimiterService,
    @Optional() private readonly metricsService: MetricsService | null = null,
  ) {}

  public async fetchText(request: IPriceSourceRequest): Promise<string | null> {
    return this.readBody(request, 'text/html,application/xhtml+xml');
  }

  public async fetchJson(request: IPriceSourceRequest): Promise<unknown> {
    const body: string | null = await this.readBody(request, 'application/json');

    if (body === null) {
      return null;
    }

    try {
      const payload: unknown = JSON.parse(body);
      return payload;
    } catch {
      throw new ParseFailureError(request.source, 'response is not valid JSON', body);
    }
  }

  private async readBody(request: IPriceSourceRequest, accept: string): Promise<string | null> {
    const response: Response | null = await this.send(request, accept);

    if (response === null) {
      return null;
    }

    try {
      return await response.text();
    } catch (error: unknown) {
      throw new SourceUnreachableError(
        request.source,
        `body read failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private async send(request: IPriceSourceRequest, accept: string): Promise<Response | null> {
    const startedAtMs: number = Date.now();
    let response: Response;

    try {
      response = await this.rateLimiterService.schedule(
        request.limiterKey,
        async (): Promise<Response> =>
          fetch(request.url, {
            method: 'GET',
            headers: {
              Accept: accept,
              'Accept-Language': 'ja,en;q=0.8',
              'User-Agent': this.appConfigService.sourceUserAgent,
            },
            signal: AbortSignal.timeout(this.appConfigService.sourceTimeoutMs),
          }),
        request.priority ?? RequestPriority.NORMAL,
      );
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      const status: RequestStatus = this.isTimeoutError(error, errorMessage)
        ? 'timeout'
        : 'network_error';
      this.recordRequest(request.source, status, startedAtMs);
      this.logger.warn(
        `price_source_request_failed source=${request.source} status=${status} reason=${errorMessage}`,
      );
      throw new SourceUnreachableError(request.source, `${status}: ${errorMessage}`);
    }

    if (response.status === HTTP_STATUS_NOT_FOUND) {
      this.recordRequest(request.source, 'not_found', startedAtMs);
      return null;
    }

    if (!response.ok) {
      const status: RequestStatus =
        response.status === HTTP_STATUS_TOO_MANY_REQUESTS ? 'rate_limited' : 'http_error';
      this.recordRequest(request.source, status, startedAtMs);
      this.logger.warn(
        `price_source_request_failed source=${request.source} status=${status} http=${String(response.status)}`,
      );
      throw new SourceUnreachableError(
        request.source,
        `${status}: HTTP ${String(response.status)}`,
        response.status,
      );
    }

    this.recordRequest(request.source, 'ok', startedAtMs);
    return response;
  }

  private isTimeoutError(error: unknown, errorMessage: string): boolean {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      return true;
    }

    const normalizedErrorMessage: string = errorMessage.toLowerCase();
    return normalizedErrorMessage.includes('timeout') || normalizedErrorMessage.includes('aborted');
  }

  private recordRequest(source: string, status: RequestStatus, startedAtMs: number): void {
    this.metricsService?.priceSourceRequestsTotal.inc({ source, status });
    this.metricsService?.priceSourceRequestDurationSeconds.observe(
      { source },
      (Date.now() - startedAtMs) / 1000,
    );
  }
}
