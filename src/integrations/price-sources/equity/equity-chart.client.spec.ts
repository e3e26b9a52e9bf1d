import { describe, expect, it, vi } from 'vitest';

import { EquityChartClient } from './equity-chart.client';
import type { IChartMeta } from './equity-chart.interfaces';
import { ParseFailureError } from '../../../common/interfaces/pricing/price-source.errors';
import type { AppConfigService } from '../../../config/app-config.service';
import {
  LimiterKey,
  RequestPriority,
} from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import type { PriceSourceHttpClient } from '../http/price-source-http.client';

type HttpClientStub = {
  readonly fetchJson: ReturnType<typeof vi.fn>;
};

const createConfigStub = (): AppConfigService =>
  ({
    equityChartApiBaseUrl: 'https://chart.example.com',
  }) as unknown as AppConfigService;

const createClient = (payload: unknown): { client: EquityChartClient; http: HttpClientStub } => {
  const http: HttpClientStub = { fetchJson: vi.fn().mockResolvedValue(payload) };
  const client: EquityChartClient = new EquityChartClient(
    createConfigStub(),
    http as unknown as PriceSourceHttpClient,
  );
  return { client, http };
};

describe('EquityChartClient', (): void => {
  it('builds the chart url and maps meta fields', async (): Promise<void> => {
    const { client, http } = createClient({
      chart: {
        result: [
          {
            meta: {
              symbol: '7203.T',
              currency: 'JPY',
              regularMarketPrice: 2875.5,
              chartPreviousClose: 2850,
              shortName: 'TOYOTA MOTOR CORP',
            },
          },
        ],
        error: null,
      },
    });

    const meta: IChartMeta | null = await client.fetchChartMeta('7203.T');

    expect(meta).toEqual({
      symbol: '7203.T',
      currency: 'JPY',
      regularMarketPrice: 2875.5,
      previousClose: 2850,
      displayName: 'TOYOTA MOTOR CORP',
    });
    const request = http.fetchJson.mock.calls[0]?.[0];
    expect(String(request?.url)).toBe(
      'https://chart.example.com/v8/finance/chart/7203.T?range=1d&interval=1d',
    );
    expect(request).toMatchObject({
      source: 'equity_chart_api',
      limiterKey: LimiterKey.EQUITY_QUOTES,
      priority: RequestPriority.NORMAL,
    });
  });

  it('prefers previousClose and longName when present', async (): Promise<void> => {
    const { client } = createClient({
      chart: {
        result: [
          {
            meta: {
              symbol: 'AAPL',
              currency: 'USD',
              regularMarketPrice: 187.44,
              previousClose: 185.1,
              chartPreviousClose: 180,
              longName: 'Apple Inc.',
              shortName: 'Apple',
            },
          },
        ],
      },
    });

    await expect(client.fetchChartMeta('AAPL')).resolves.toMatchObject({
      previousClose: 185.1,
      displayName: 'Apple Inc.',
    });
  });

  it('returns null for 404 and for not found chart errors', async (): Promise<void> => {
    const missing = createClient(null);
    await expect(missing.client.fetchChartMeta('ZZZZ')).resolves.toBeNull();

    const notFound = createClient({
      chart: {
        result: null,
        error: { code: 'Not Found', description: 'No data found, symbol may be delisted' },
      },
    });
    await expect(notFound.client.fetchChartMeta('ZZZZ')).resolves.toBeNull();
  });

  it('rejects payloads that do not match the chart shape', async (): Promise<void> => {
    const { client } = createClient({ chart: { result: [{ meta: { symbol: 'AAPL' } }] } });

    await expect(client.fetchChartMeta('AAPL')).rejects.toBeInstanceOf(ParseFailureError);
  });

  it('rejects empty results without a not found error', async (): Promise<void> => {
    const { client } = createClient({ chart: { result: [], error: null } });

    await expect(client.fetchChartMeta('AAPL')).rejects.toThrow(
      'equity_chart_api: chart result is empty for symbol=AAPL',
    );
  });
});
