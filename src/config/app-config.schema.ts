import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';

const booleanSchema = z
  .union([z.boolean(), z.string()])
  .transform((value: string | boolean): boolean => {
    if (typeof value === 'boolean') {
      return value;
    }

    const normalizedValue: string = value.trim().toLowerCase();

    return normalizedValue === 'true' || normalizedValue === '1' || normalizedValue === 'yes';
  });

const resolvePackageVersion = (): string => {
  try {
    const packageJsonPath: string = resolve(process.cwd(), 'package.json');
    const packageJsonRaw: string = readFileSync(packageJsonPath, 'utf8');
    const packageJsonParsed: unknown = JSON.parse(packageJsonRaw);

    if (
      typeof packageJsonParsed === 'object' &&
      packageJsonParsed !== null &&
      'version' in packageJsonParsed
    ) {
      const versionValue: unknown = packageJsonParsed.version;

      if (typeof versionValue === 'string' && versionValue.trim().length > 0) {
        return versionValue.trim();
      }
    }
  } catch {
    // Fallback is handled below.
  }

  return '0.0.0';
};

const DEFAULT_APP_VERSION: string = resolvePackageVersion();
const DEFAULT_PORT = 3000;
const DEFAULT_SOURCE_TIMEOUT_MS = 5000;
const DEFAULT_SOURCE_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';
const DEFAULT_EQUITY_TTL_SEC = 300;
const DEFAULT_GOLD_TTL_SEC = 3600;
const DEFAULT_CRYPTO_TTL_SEC = 300;
const DEFAULT_FUND_TTL_SEC = 3600;
const DEFAULT_PRICE_CACHE_STALE_RETENTION_SEC = 86_400;
const DEFAULT_PRICE_FETCH_MAX_ATTEMPTS = 2;
const DEFAULT_PRICE_FETCH_BACKOFF_BASE_MS = 500;
const DEFAULT_PRICE_FETCH_BACKOFF_MAX_MS = 5000;
const DEFAULT_SNAPSHOT_CONCURRENCY = 4;
const MAX_SNAPSHOT_CONCURRENCY = 8;
const DEFAULT_SNAPSHOT_RUN_TIMEOUT_MS = 240_000;
const DEFAULT_KEEP_ALIVE_INTERVAL_SEC = 600;
const DEFAULT_KEEP_ALIVE_TIMEOUT_MS = 5000;
const DEFAULT_FX_RATE_CACHE_TTL_SEC = 900;
const DEFAULT_FX_RATE_FALLBACK_USD_JPY = 150;
const DEFAULT_RATE_LIMIT_EQUITY_MIN_TIME_MS = 250;
const DEFAULT_RATE_LIMIT_EQUITY_MAX_CONCURRENT = 2;
const DEFAULT_RATE_LIMIT_METAL_MIN_TIME_MS = 1000;
const DEFAULT_RATE_LIMIT_METAL_MAX_CONCURRENT = 1;
const DEFAULT_RATE_LIMIT_CRYPTO_MIN_TIME_MS = 500;
const DEFAULT_RATE_LIMIT_CRYPTO_MAX_CONCURRENT = 2;
const DEFAULT_RATE_LIMIT_FUND_MIN_TIME_MS = 1000;
const DEFAULT_RATE_LIMIT_FUND_MAX_CONCURRENT = 1;

const optionalNonEmptyStringSchema = z
  .string()
  .trim()
  .optional()
  .transform((value: string | undefined): string | undefined => {
    if (typeof value !== 'string') {
      return undefined;
    }

    return value.length > 0 ? value : undefined;
  });

const positiveIntSchema = (defaultValue: number) =>
  z.coerce.number().int().positive().default(defaultValue);

const nonNegativeIntSchema = (defaultValue: number) =>
  z.coerce.number().int().min(0).default(defaultValue);

export const envSchema = z.object({
  APP_VERSION: z.string().trim().min(1).default(DEFAULT_APP_VERSION),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: positiveIntSchema(DEFAULT_PORT),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  DATABASE_URL: z.url(),
  DATABASE_MIGRATIONS_ENABLED: booleanSchema.default(true),
  METRICS_ENABLED: booleanSchema.default(true),
  SOURCE_TIMEOUT_MS: positiveIntSchema(DEFAULT_SOURCE_TIMEOUT_MS),
  SOURCE_USER_AGENT: z.string().trim().min(1).default(DEFAULT_SOURCE_USER_AGENT),
  EQUITY_CHART_API_BASE_URL: z.url().default('https://query1.finance.yahoo.com'),
  GOLD_PRICE_URL: z.url().default('https://gold.tanaka.co.jp/commodity/souba/m-gold.php'),
  CRYPTO_PRICE_BASE_URL: z.url().default('https://cc.minkabu.jp'),
  FUND_PRICE_BASE_URL: z.url().default('https://www.rakuten-sec.co.jp'),
  PRICE_CACHE_MAX_ENTRIES: positiveIntSchema(1000),
  PRICE_CACHE_TTL_JP_STOCK_SEC: positiveIntSchema(DEFAULT_EQUITY_TTL_SEC),
  PRICE_CACHE_TTL_US_STOCK_SEC: positiveIntSchema(DEFAULT_EQUITY_TTL_SEC),
  PRICE_CACHE_TTL_GOLD_SEC: positiveIntSchema(DEFAULT_GOLD_TTL_SEC),
  PRICE_CACHE_TTL_CRYPTO_SEC: positiveIntSchema(DEFAULT_CRYPTO_TTL_SEC),
  PRICE_CACHE_TTL_FUND_SEC: positiveIntSchema(DEFAULT_FUND_TTL_SEC),
  PRICE_CACHE_STALE_RETENTION_SEC: positiveIntSchema(DEFAULT_PRICE_CACHE_STALE_RETENTION_SEC),
  PRICE_FETCH_MAX_ATTEMPTS: positiveIntSchema(DEFAULT_PRICE_FETCH_MAX_ATTEMPTS),
  PRICE_FETCH_BACKOFF_BASE_MS: positiveIntSchema(DEFAULT_PRICE_FETCH_BACKOFF_BASE_MS),
  PRICE_FETCH_BACKOFF_MAX_MS: positiveIntSchema(DEFAULT_PRICE_FETCH_BACKOFF_MAX_MS),
  SNAPSHOT_ENABLED: booleanSchema.default(true),
  SNAPSHOT_TIME: z.string().trim().default('23:58'),
  SNAPSHOT_TIMEZONE: z.string().trim().min(1).default('Asia/Tokyo'),
  SNAPSHOT_CONCURRENCY: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_SNAPSHOT_CONCURRENCY)
    .default(DEFAULT_SNAPSHOT_CONCURRENCY),
  SNAPSHOT_RUN_TIMEOUT_MS: positiveIntSchema(DEFAULT_SNAPSHOT_RUN_TIMEOUT_MS),
  KEEP_ALIVE_URL: optionalNonEmptyStringSchema.pipe(z.url().optional()),
  KEEP_ALIVE_INTERVAL_SEC: positiveIntSchema(DEFAULT_KEEP_ALIVE_INTERVAL_SEC),
  KEEP_ALIVE_TIMEOUT_MS: positiveIntSchema(DEFAULT_KEEP_ALIVE_TIMEOUT_MS),
  FX_RATE_CACHE_TTL_SEC: positiveIntSchema(DEFAULT_FX_RATE_CACHE_TTL_SEC),
  FX_RATE_FALLBACK_USD_JPY: z.coerce.number().positive().default(DEFAULT_FX_RATE_FALLBACK_USD_JPY),
  RATE_LIMIT_EQUITY_MIN_TIME_MS: nonNegativeIntSchema(DEFAULT_RATE_LIMIT_EQUITY_MIN_TIME_MS),
  RATE_LIMIT_EQUITY_MAX_CONCURRENT: positiveIntSchema(DEFAULT_RATE_LIMIT_EQUITY_MAX_CONCURRENT),
  RATE_LIMIT_METAL_MIN_TIME_MS: nonNegativeIntSchema(DEFAULT_RATE_LIMIT_METAL_MIN_TIME_MS),
  RATE_LIMIT_METAL_MAX_CONCURRENT: positiveIntSchema(DEFAULT_RATE_LIMIT_METAL_MAX_CONCURRENT),
  RATE_LIMIT_CRYPTO_MIN_TIME_MS: nonNegativeIntSchema(DEFAULT_RATE_LIMIT_CRYPTO_MIN_TIME_MS),
  RATE_LIMIT_CRYPTO_MAX_CONCURRENT: positiveIntSchema(DEFAULT_RATE_LIMIT_CRYPTO_MAX_CONCURRENT),
  RATE_LIMIT_FUND_MIN_TIME_MS: nonNegativeIntSchema(DEFAULT_RATE_LIMIT_FUND_MIN_TIME_MS),
  RATE_LIMIT_FUND_MAX_CONCURRENT: positiveIntSchema(DEFAULT_RATE_LIMIT_FUND_MAX_CONCURRENT),
});

export type ParsedEnv = z.infer<typeof envSchema>;
