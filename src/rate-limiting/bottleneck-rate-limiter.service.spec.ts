import { describe, expect, it } from 'vitest';

import {
  type ILimiterMetrics,
  LimiterKey,
  RequestPriority,
} from './bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from './bottleneck-rate-limiter.service';
import type { AppConfigService } from '../config/app-config.service';

const createConfigStub = (): AppConfigService =>
  ({
    rateLimitEquityMinTimeMs: 0,
    rateLimitEquityMaxConcurrent: 2,
    rateLimitMetalMinTimeMs: 0,
    rateLimitMetalMaxConcurrent: 1,
    rateLimitCryptoMinTimeMs: 0,
    rateLimitCryptoMaxConcurrent: 2,
    rateLimitFundMinTimeMs: 0,
    rateLimitFundMaxConcurrent: 1,
  }) as unknown as AppConfigService;

describe('BottleneckRateLimiterService', (): void => {
  it('schedules and executes an operation', async (): Promise<void> => {
    const service: BottleneckRateLimiterService = new BottleneckRateLimiterService(
      createConfigStub(),
    );

    const result: string = await service.schedule(
      LimiterKey.CRYPTO_PRICES,
      async (): Promise<string> => 'ok',
    );

    expect(result).toBe('ok');
    await service.onModuleDestroy();
  });

  it('propagates operation errors', async (): Promise<void> => {
    const service: BottleneckRateLimiterService = new BottleneckRateLimiterService(
      createConfigStub(),
    );

    await expect(
      service.schedule(LimiterKey.FUND_NAV, async (): Promise<string> => {
        throw new Error('nav page down');
      }),
    ).rejects.toThrow('nav page down');

    await service.onModuleDestroy();
  });

  it('serializes jobs on a single-slot limiter', async (): Promise<void> => {
    const service: BottleneckRateLimiterService = new BottleneckRateLimiterService(
      createConfigStub(),
    );
    const order: string[] = [];

    await Promise.all(
      ['first', 'second', 'third'].map(
        (label: string): Promise<void> =>
          service.schedule(
            LimiterKey.METAL_PRICES,
            async (): Promise<void> => {
              order.push(`start:${label}`);
              await Promise.resolve();
              order.push(`end:${label}`);
            },
            RequestPriority.NORMAL,
          ),
      ),
    );

    expect(order).toEqual([
      'start:first',
      'end:first',
      'start:second',
      'end:second',
      'start:third',
      'end:third',
    ]);
    await service.onModuleDestroy();
  });

  it('returns idle queue metrics', async (): Promise<void> => {
    const service: BottleneckRateLimiterService = new BottleneckRateLimiterService(
      createConfigStub(),
    );

    const metrics: ILimiterMetrics = service.getMetrics(LimiterKey.EQUITY_QUOTES);

    expect(metrics).toEqual({ queueSize: 0, running: 0 });
    await service.onModuleDestroy();
  });

  it('creates one limiter per price source', async (): Promise<void> => {
    const service: BottleneckRateLimiterService = new BottleneckRateLimiterService(
      createConfigStub(),
    );

    expect(service.getAllKeys()).toEqual([
      LimiterKey.EQUITY_QUOTES,
      LimiterKey.METAL_PRICES,
      LimiterKey.CRYPTO_PRICES,
      LimiterKey.FUND_NAV,
    ]);
    await service.onModuleDestroy();
  });

  it('throws for unknown limiter key', async (): Promise<void> => {
    const service: BottleneckRateLimiterService = new BottleneckRateLimiterService(
      createConfigStub(),
    );

    await expect(
      service.schedule('unknown_key' as LimiterKey, async (): Promise<string> => 'ok'),
    ).rejects.toThrow('No rate limiter configured for key=unknown_key');

    await service.onModuleDestroy();
  });
});
