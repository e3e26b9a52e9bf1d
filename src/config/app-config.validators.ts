import type { ParsedEnv } from './app-config.schema';

const DAILY_TIME_PATTERN: RegExp = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function assertPricingConfig(parsedEnv: ParsedEnv): void {
  assertBackoffConfig(parsedEnv);
  assertCacheConfig(parsedEnv);
  assertSnapshotConfig(parsedEnv);
}

function assertBackoffConfig(parsedEnv: ParsedEnv): void {
  if (parsedEnv.PRICE_FETCH_BACKOFF_MAX_MS < parsedEnv.PRICE_FETCH_BACKOFF_BASE_MS) {
    throw new Error('PRICE_FETCH_BACKOFF_MAX_MS must be >= PRICE_FETCH_BACKOFF_BASE_MS');
  }
}

function assertCacheConfig(parsedEnv: ParsedEnv): void {
  const ttlEntries: readonly (readonly [string, number])[] = [
    ['PRICE_CACHE_TTL_JP_STOCK_SEC', parsedEnv.PRICE_CACHE_TTL_JP_STOCK_SEC],
    ['PRICE_CACHE_TTL_US_STOCK_SEC', parsedEnv.PRICE_CACHE_TTL_US_STOCK_SEC],
    ['PRICE_CACHE_TTL_GOLD_SEC', parsedEnv.PRICE_CACHE_TTL_GOLD_SEC],
    ['PRICE_CACHE_TTL_CRYPTO_SEC', parsedEnv.PRICE_CACHE_TTL_CRYPTO_SEC],
    ['PRICE_CACHE_TTL_FUND_SEC', parsedEnv.PRICE_CACHE_TTL_FUND_SEC],
  ];

  for (const [name, ttlSec] of ttlEntries) {
    if (parsedEnv.PRICE_CACHE_STALE_RETENTION_SEC < ttlSec) {
      throw new Error(`PRICE_CACHE_STALE_RETENTION_SEC must be >= ${name}`);
    }
  }
}

function assertSnapshotConfig(parsedEnv: ParsedEnv): void {
  if (!DAILY_TIME_PATTERN.test(parsedEnv.SNAPSHOT_TIME)) {
    throw new Error('SNAPSHOT_TIME must use HH:MM format');
  }

  if (!isValidTimezone(parsedEnv.SNAPSHOT_TIMEZONE)) {
    throw new Error(`SNAPSHOT_TIMEZONE is not a valid IANA timezone: ${parsedEnv.SNAPSHOT_TIMEZONE}`);
  }
}

function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}
