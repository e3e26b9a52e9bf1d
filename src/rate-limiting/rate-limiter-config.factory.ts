import { type IBottleneckConfig, LimiterKey } from './bottleneck-rate-limiter.interfaces';
import type { AppConfigService } from '../config/app-config.service';

export function buildLimiterConfigs(
  config: AppConfigService,
): ReadonlyMap<LimiterKey, IBottleneckConfig> {
  return new Map<LimiterKey, IBottleneckConfig>([
    [
      LimiterKey.EQUITY_QUOTES,
      {
        minTime: config.rateLimitEquityMinTimeMs,
        maxConcurrent: config.rateLimitEquityMaxConcurrent,
      },
    ],
    [
      LimiterKey.METAL_PRICES,
      {
        minTime: config.rateLimitMetalMinTimeMs,
        maxConcurrent: config.rateLimitMetalMaxConcurrent,
      },
    ],
    [
      LimiterKey.CRYPTO_PRICES,
      {
        minTime: config.rateLimitCryptoMinTimeMs,
        maxConcurrent: config.rateLimitCryptoMaxConcurrent,
      },
    ],
    [
      LimiterKey.FUND_NAV,
      {
        minTime: config.rateLimitFundMinTimeMs,
        maxConcurrent: config.rateLimitFundMaxConcurrent,
      },
    ],
  ]);
}
