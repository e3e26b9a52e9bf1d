export type NodeEnv = 'development' | 'test' | 'production';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type DailyTime = {
  readonly hour: number;
  readonly minute: number;
};

export type AppConfig = {
  readonly appVersion: string;
  readonly nodeEnv: NodeEnv;
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly databaseUrl: string;
  readonly databaseMigrationsEnabled: boolean;
  readonly metricsEnabled: boolean;
  readonly sourceTimeoutMs: number;
  readonly sourceUserAgent: string;
  readonly equityChartApiBaseUrl: string;
  readonly goldPriceUrl: string;
  readonly cryptoPriceBaseUrl: string;
  readonly fundPriceBaseUrl: string;
  readonly priceCacheMaxEntries: number;
  readonly priceCacheTtlJpStockSec: number;
  readonly priceCacheTtlUsStockSec: number;
  readonly priceCacheTtlGoldSec: number;
  readonly priceCacheTtlCryptoSec: number;
  readonly priceCacheTtlFundSec: number;
  readonly priceCacheStaleRetentionSec: number;
  readonly priceFetchMaxAttempts: number;
  readonly priceFetchBackoffBaseMs: number;
  readonly priceFetchBackoffMaxMs: number;
  readonly snapshotEnabled: boolean;
  readonly snapshotTime: DailyTime;
  readonly snapshotTimezone: string;
  readonly snapshotConcurrency: number;
  readonly snapshotRunTimeoutMs: number;
  readonly keepAliveUrl: string | null;
  readonly keepAliveIntervalSec: number;
  readonly keepAliveTimeoutMs: number;
  readonly fxRateCacheTtlSec: number;
  readonly fxRateFallbackUsdJpy: number;
  readonly rateLimitEquityMinTimeMs: number;
  readonly rateLimitEquityMaxConcurrent: number;
  readonly rateLimitMetalMinTimeMs: number;
  readonly rateLimitMetalMaxConcurrent: number;
  readonly rateLimitCryptoMinTimeMs: number;
  readonly rateLimitCryptoMaxConcurrent: number;
  readonly rateLimitFundMinTimeMs: number;
  readonly rateLimitFundMaxConcurrent: number;
};
