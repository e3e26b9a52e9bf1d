export enum LimiterKey {
  EQUITY_QUOTES = 'equity_quotes',
  METAL_PRICES = 'metal_prices',
  CRYPTO_PRICES = 'crypto_prices',
  FUND_NAV = 'fund_nav',
}

// Bottleneck priority: lower number = higher priority (0–9 range)
/* eslint-disable no-magic-numbers */
export enum RequestPriority {
  HIGH = 3,
  NORMAL = 5,
}
/* eslint-enable no-magic-numbers */

export interface IBottleneckConfig {
  readonly minTime: number;
  readonly maxConcurrent: number;
}

export interface ILimiterMetrics {
  readonly queueSize: number;
  readonly running: number;
}
