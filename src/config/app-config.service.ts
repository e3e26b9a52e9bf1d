import { Injectable } from '@nestjs/common';

import { mapAppConfig } from './app-config.mapper';
import { envSchema, type ParsedEnv } from './app-config.schema';
import type { AppConfig, DailyTime, LogLevel, NodeEnv } from './app-config.types';
import { assertPricingConfig } from './app-config.validators';

@Injectable()
export class AppConfigService {
  private readonly config: AppConfig;

  public constructor() {
    const parsedEnv: ParsedEnv = envSchema.parse(process.env);
    assertPricingConfig(parsedEnv);

    this.config = mapAppConfig(parsedEnv);
  }

  public get appVersion(): string {
    return this.config.appVersion;
  }

  public get nodeEnv(): NodeEnv {
    return this.config.nodeEnv;
  }

  public get port(): number {
    return this.config.port;
  }

  public get logLevel(): LogLevel {
    return this.config.logLevel;
  }

  public get databaseUrl(): string {
    return this.config.databaseUrl;
  }

  public get databaseMigrationsEnabled(): boolean {
    return this.config.databaseMigrationsEnabled;
  }

  public get metricsEnabled(): boolean {
    return this.config.metricsEnabled;
  }

  public get sourceTimeoutMs(): number {
    return this.config.sourceTimeoutMs;
  }

  public get sourceUserAgent(): string {
    return this.config.sourceUserAgent;
  }

  public get equityChartApiBaseUrl(): string {
    return this.config.equityChartApiBaseUrl;
  }

  public get goldPriceUrl(): string {
    return this.config.goldPriceUrl;
  }

  public get cryptoPriceBaseUrl(): string {
    return this.config.cryptoPriceBaseUrl;
  }

  public get fundPriceBaseUrl(): string {
    return this.config.fundPriceBaseUrl;
  }

  public get priceCacheMaxEntries(): number {
    return this.config.priceCacheMaxEntries;
  }

  public get priceCacheTtlJpStockSec(): number {
    return this.config.priceCacheTtlJpStockSec;
  }

  public get priceCacheTtlUsStockSec(): number {
    return this.config.priceCacheTtlUsStockSec;
  }

  public get priceCacheTtlGoldSec(): number {
    return this.config.priceCacheTtlGoldSec;
  }

  public get priceCacheTtlCryptoSec(): number {
    return this.config.priceCacheTtlCryptoSec;
  }

  public get priceCacheTtlFundSec(): number {
    return this.config.priceCacheTtlFundSec;
  }

  public get priceCacheStaleRetentionSec(): number {
    return this.config.priceCacheStaleRetentionSec;
  }

  public get priceFetchMaxAttempts(): number {
    return this.config.priceFetchMaxAttempts;
  }

  public get priceFetchBackoffBaseMs(): number {
    return this.config.priceFetchBackoffBaseMs;
  }

  public get priceFetchBackoffMaxMs(): number {
    return this.config.priceFetchBackoffMaxMs;
  }

  public get snapshotEnabled(): boolean {
    return this.config.snapshotEnabled;
  }

  public get snapshotTime(): DailyTime {
    return this.config.snapshotTime;
  }

  public get snapshotTimezone(): string {
    return this.config.snapshotTimezone;
  }

  public get snapshotConcurrency(): number {
    return this.config.snapshotConcurrency;
  }

  public get snapshotRunTimeoutMs(): number {
    return this.config.snapshotRunTimeoutMs;
  }

  public get keepAliveUrl(): string | null {
    return this.config.keepAliveUrl;
  }

  public get keepAliveIntervalSec(): number {
    return this.config.keepAliveIntervalSec;
  }

  public get keepAliveTimeoutMs(): number {
    return this.config.keepAliveTimeoutMs;
  }

  public get fxRateCacheTtlSec(): number {
    return this.config.fxRateCacheTtlSec;
  }

  public get fxRateFallbackUsdJpy(): number {
    return this.config.fxRateFallbackUsdJpy;
  }

  public get rateLimitEquityMinTimeMs(): number {
    return this.config.rateLimitEquityMinTimeMs;
  }

  public get rateLimitEquityMaxConcurrent(): number {
    return this.config.rateLimitEquityMaxConcurrent;
  }

  public get rateLimitMetalMinTimeMs(): number {
    return this.config.rateLimitMetalMinTimeMs;
  }

  public get rateLimitMetalMaxConcurrent(): number {
    return this.config.rateLimitMetalMaxConcurrent;
  }

  public get rateLimitCryptoMinTimeMs(): number {
    return this.config.rateLimitCryptoMinTimeMs;
  }

  public get rateLimitCryptoMaxConcurrent(): number {
    return this.config.rateLimitCryptoMaxConcurrent;
  }

  public get rateLimitFundMinTimeMs(): number {
    return this.config.rateLimitFundMinTimeMs;
  }

  public get rateLimitFundMaxConcurrent(): number {
    return this.config.rateLimitFundMaxConcurrent;
  }
}
