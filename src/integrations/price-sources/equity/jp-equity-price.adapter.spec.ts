import { afterEach, describe, expect, it, vi } from 'vitest';

import type { EquityChartClient } from './equity-chart.client';
import { JpEquityPriceAdapter, normalizeSecuritiesCode } from './jp-equity-price.adapter';
import { AssetKind } from '../../../common/interfaces/pricing/asset-kind.interfaces';
import {
  SourceUnreachableError,
  UnsupportedAssetError,
} from '../../../common/interfaces/pricing/price-source.errors';

type ChartClientStub = {
  readonly fetchChartMeta: ReturnType<typeof vi.fn>;
};

const createAdapter = (chartClient: ChartClientStub): JpEquityPriceAdapter =>
  new JpEquityPriceAdapter(chartClient as unknown as EquityChartClient);

describe('JpEquityPriceAdapter', (): void => {
  afterEach((): void => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('requests the Tokyo symbol and returns a yen quote', async (): Promise<void> => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-10-19T05:00:00.000Z'));
    const chartClient: ChartClientStub = {
      fetchChartMeta: vi.fn().mockResolvedValue({
        symbol: '7203.T',
        currency: 'JPY',
        regularMarketPrice: 2875.5,
        previousClose: 2850,
        displayName: 'TOYOTA MOTOR CORP',
      }),
    };

    const quote = await createAdapter(chartClient).fetch(' 7203 ');

    expect(chartClient.fetchChartMeta).toHaveBeenCalledWith('7203.T');
    expect(quote).toEqual({
      kind: AssetKind.JP_STOCK,
      identifier: '7203',
      currentPrice: 2875.5,
      previousClose: 2850,
      currency: 'JPY',
      displayName: 'TOYOTA MOTOR CORP',
      fetchedAtEpochMs: Date.parse('2026-10-19T05:00:00.000Z'),
      source: 'equity_chart_api',
    });
  });

  it('rejects malformed codes without a request', async (): Promise<void> => {
    const chartClient: ChartClientStub = { fetchChartMeta: vi.fn() };

    await expect(createAdapter(chartClient).fetch('AAPL')).rejects.toBeInstanceOf(
      UnsupportedAssetError,
    );
    expect(chartClient.fetchChartMeta).not.toHaveBeenCalled();
  });

  it('maps unknown symbols to unsupported asset', async (): Promise<void> => {
    const chartClient: ChartClientStub = { fetchChartMeta: vi.fn().mockResolvedValue(null) };

    await expect(createAdapter(chartClient).fetch('9999')).rejects.toThrow(
      'Unsupported asset kind=jp_stock identifier=9999',
    );
  });

  it('propagates source errors unchanged', async (): Promise<void> => {
    const error: SourceUnreachableError = new SourceUnreachableError(
      'equity_chart_api',
      'timeout: aborted',
    );
    const chartClient: ChartClientStub = { fetchChartMeta: vi.fn().mockRejectedValue(error) };

    await expect(createAdapter(chartClient).fetch('7203')).rejects.toBe(error);
  });

  it('rejects a chart quoted in another currency', async (): Promise<void> => {
    const chartClient: ChartClientStub = {
      fetchChartMeta: vi.fn().mockResolvedValue({
        symbol: '7203.T',
        currency: 'USD',
        regularMarketPrice: 21.4,
        previousClose: null,
        displayName: null,
      }),
    };

    await expect(createAdapter(chartClient).fetch('7203')).rejects.toThrow(
      'equity_chart_api: unexpected currency USD for symbol=7203.T, expected JPY',
    );
  });
});

describe('normalizeSecuritiesCode', (): void => {
  it('accepts numeric and alphanumeric codes with optional suffix', (): void => {
    expect(normalizeSecuritiesCode('7203')).toBe('7203');
    expect(normalizeSecuritiesCode('130a')).toBe('130A');
    expect(normalizeSecuritiesCode('6758.T')).toBe('6758');
  });

  it('rejects other shapes', (): void => {
    expect(normalizeSecuritiesCode('72030')).toBeNull();
    expect(normalizeSecuritiesCode('A203')).toBeNull();
    expect(normalizeSecuritiesCode('')).toBeNull();
  });
});
