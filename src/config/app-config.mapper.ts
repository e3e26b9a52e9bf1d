import type { ParsedEnv } from './app-config.schema';
import type { AppConfig, DailyTime } from './app-config.types';

export const mapAppConfig = (parsedEnv: ParsedEnv): AppConfig => ({
  ...mapCoreConfig(parsedEnv),
  ...mapSourceConfig(parsedEnv),
  ...mapCacheConfig(parsedEnv),
  ...mapSchedulerConfig(parsedEnv),
  ...mapRateLimitConfig(parsedEnv),
});

const mapCoreConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'appVersion'
  | 'nodeEnv'
  | 'port'
  | 'logLevel'
  | 'databaseUrl'
  | 'databaseMigrationsEnabled'
  | 'metricsEnabled'
> => ({
  appVersion: parsedEnv.APP_VERSION,
  nodeEnv: parsedEnv.NODE_ENV,
  port: parsedEnv.PORT,
  logLevel: parsedEnv.LOG_LEVEL,
  databaseUrl: parsedEnv.DATABASE_URL,
  databaseMigrationsEnabled: parsedEnv.DATABASE_MIGRATIONS_ENABLED,
  metricsEnabled: parsedEnv.METRICS_ENABLED,
});

const mapSourceConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'sourceTimeoutMs'
  | 'sourceUserAgent'
  | 'equityChartApiBaseUrl'
  | 'goldPriceUrl'
  | 'cryptoPriceBaseUrl'
  | 'fundPriceBaseUrl'
  | 'fxRateCacheTtlSec'
  | 'fxRateFallbackUsdJpy'
> => ({
  sourceTimeoutMs: parsedEnv.SOURCE_TIMEOUT_MS,
  sourceUserAgent: parsedEnv.SOURCE_USER_AGENT,
  equityChartApiBaseUrl: trimTrailingSlash(parsedEnv.EQUITY_CHART_API_BASE_URL),
  goldPriceUrl: parsedEnv.GOLD_PRICE_URL,
  cryptoPriceBaseUrl: trimTrailingSlash(parsedEnv.CRYPTO_PRICE_BASE_URL),
  fundPriceBaseUrl: trimTrailingSlash(parsedEnv.FUND_PRICE_BASE_URL),
  fxRateCacheTtlSec: parsedEnv.FX_RATE_CACHE_TTL_SEC,
  fxRateFallbackUsdJpy: parsedEnv.FX_RATE_FALLBACK_USD_JPY,
});

const mapCacheConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'priceCacheMaxEntries'
  | 'priceCacheTtlJpStockSec'
  | 'priceCacheTtlUsStockSec'
  | 'priceCacheTtlGoldSec'
  | 'priceCacheTtlCryptoSec'
  | 'priceCacheTtlFundSec'
  | 'priceCacheStaleRetentionSec'
  | 'priceFetchMaxAttempts'
  | 'priceFetchBackoffBaseMs'
  | 'priceFetchBackoffMaxMs'
> => ({
  priceCacheMaxEntries: parsedEnv.PRICE_CACHE_MAX_ENTRIES,
  priceCacheTtlJpStockSec: parsedEnv.PRICE_CACHE_TTL_JP_STOCK_SEC,
  priceCacheTtlUsStockSec: parsedEnv.PRICE_CACHE_TTL_US_STOCK_SEC,
  priceCacheTtlGoldSec: parsedEnv.PRICE_CACHE_TTL_GOLD_SEC,
  priceCacheTtlCryptoSec: parsedEnv.PRICE_CACHE_TTL_CRYPTO_SEC,
  priceCacheTtlFundSec: parsedEnv.PRICE_CACHE_TTL_FUND_SEC,
  priceCacheStaleRetentionSec: parsedEnv.PRICE_CACHE_STALE_RETENTION_SEC,
  priceFetchMaxAttempts: parsedEnv.PRICE_FETCH_MAX_ATTEMPTS,
  priceFetchBackoffBaseMs: parsedEnv.PRICE_FETCH_BACKOFF_BASE_MS,
  priceFetchBackoffMaxMs: parsedEnv.PRICE_FETCH_BACKOFF_MAX_MS,
});

const mapSchedulerConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'snapshotEnabled'
  | 'snapshotTime'
  | 'snapshotTimezone'
  | 'snapshotConcurrency'
  | 'snapshotRunTimeoutMs'
  | 'keepAliveUrl'
  | 'keepAliveIntervalSec'
  | 'keepAliveTimeoutMs'
> => ({
  snapshotEnabled: parsedEnv.SNAPSHOT_ENABLED,
  snapshotTime: parseDailyTime(parsedEnv.SNAPSHOT_TIME),
  snapshotTimezone: parsedEnv.SNAPSHOT_TIMEZONE,
  snapshotConcurrency: parsedEnv.SNAPSHOT_CONCURRENCY,
  snapshotRunTimeoutMs: parsedEnv.SNAPSHOT_RUN_TIMEOUT_MS,
  keepAliveUrl:
    typeof parsedEnv.KEEP_ALIVE_URL === 'string'
      ? trimTrailingSlash(parsedEnv.KEEP_ALIVE_URL)
      : null,
  keepAliveIntervalSec: parsedEnv.KEEP_ALIVE_INTERVAL_SEC,
  keepAliveTimeoutMs: parsedEnv.KEEP_ALIVE_TIMEOUT_MS,
});

const mapRateLimitConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'rateLimitEquityMinTimeMs'
  | 'rateLimitEquityMaxConcurrent'
  | 'rateLimitMetalMinTimeMs'
  | 'rateLimitMetalMaxConcurrent'
  | 'rateLimitCryptoMinTimeMs'
  | 'rateLimitCryptoMaxConcurrent'
  | 'rateLimitFundMinTimeMs'
  | 'rateLimitFundMaxConcurrent'
> => ({
  rateLimitEquityMinTimeMs: parsedEnv.RATE_LIMIT_EQUITY_MIN_TIME_MS,
  rateLimitEquityMaxConcurrent: parsedEnv.RATE_LIMIT_EQUITY_MAX_CONCURRENT,
  rateLimitMetalMinTimeMs: parsedEnv.RATE_LIMIT_METAL_MIN_TIME_MS,
  rateLimitMetalMaxConcurrent: parsedEnv.RATE_LIMIT_METAL_MAX_CONCURRENT,
  rateLimitCryptoMinTimeMs: parsedEnv.RATE_LIMIT_CRYPTO_MIN_TIME_MS,
  rateLimitCryptoMaxConcurrent: parsedEnv.RATE_LIMIT_CRYPTO_MAX_CONCURRENT,
  rateLimitFundMinTimeMs: parsedEnv.RATE_LIMIT_FUND_MIN_TIME_MS,
  rateLimitFundMaxConcurrent: parsedEnv.RATE_LIMIT_FUND_MAX_CONCURRENT,
});

// Format is checked by assertPricingConfig before mapping.
const parseDailyTime = (rawValue: string): DailyTime => {
  const [hourPart = '0', minutePart = '0'] = rawValue.split(':');

  return {
    hour: Number.parseInt(hourPart, 10),
    minute: Number.parseInt(minutePart, 10),
  };
};

const trimTrailingSlash = (value: string): string => value.replace(/\/+$/, '');
