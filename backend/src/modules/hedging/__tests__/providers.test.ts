import { describe, it, expect, vi } from 'vitest';
import { ExchangeRateApiProvider } from '../providers/exchange-rate.provider.js';
import { YahooChartProvider } from '../providers/yahoo-chart.provider.js';
import { createHttpClient } from '../providers/http.client.js';

function httpReturning(data: unknown) {
  return { get: vi.fn().mockResolvedValue({ data }) };
}

function chart(close: Array<number | null>) {
  return {
    chart: {
      result: [{ meta: { symbol: 'BZ=F', currency: 'USD' }, indicators: { quote: [{ close }] } }],
      error: null,
    },
  };
}

describe('YahooChartProvider', () => {
  it('should return the latest non-empty close', async () => {
    const http = httpReturning(chart([80.1, null, 81.25, null]));
    const provider = new YahooChartProvider(http);

    await expect(provider.getLatestClose('BZ=F')).resolves.toBe(81.25);
    expect(http.get).toHaveBeenCalledWith('https://query1.finance.yahoo.com/v8/finance/chart/BZ%3DF', {
      params: { range: '1d', interval: '1d' },
      signal: undefined,
    });
  });

  it('should fail on an upstream error object', async () => {
    const provider = new YahooChartProvider(
      httpReturning({ chart: { result: null, error: { code: 'Not Found', description: 'No data found' } } }),
    );

    await expect(provider.getLatestClose('XX=F')).rejects.toThrow(
      'Yahoo chart error for XX=F: Not Found No data found',
    );
  });

  it('should fail when there is no usable close', async () => {
    const provider = new YahooChartProvider(httpReturning(chart([null, 0])));

    await expect(provider.getLatestClose('CL=F')).rejects.toThrow('Yahoo chart returned no close for CL=F');
  });

  it('should fail on a malformed payload', async () => {
    const provider = new YahooChartProvider(httpReturning({ quoteResponse: [] }));

    await expect(provider.getLatestClose('CL=F')).rejects.toThrow('Yahoo chart payload malformed for CL=F');
  });
});

describe('ExchangeRateApiProvider', () => {
  it('should return the validated rate table', async () => {
    const http = httpReturning({ base: 'USD', date: '2026-03-02', rates: { INR: 83, EUR: 0.85 } });
    const provider = new ExchangeRateApiProvider(http);

    await expect(provider.getRateTable('USD')).resolves.toEqual({ base: 'USD', rates: { INR: 83, EUR: 0.85 } });
    expect(http.get).toHaveBeenCalledWith('https://api.exchangerate-api.com/v4/latest/USD', { signal: undefined });
  });

  it('should reject empty and malformed tables', async () => {
    await expect(new ExchangeRateApiProvider(httpReturning({ base: 'USD', rates: {} })).getRateTable('USD')).rejects.toThrow(
      'ExchangeRate-API returned an empty rate table for base USD',
    );
    await expect(
      new ExchangeRateApiProvider(httpReturning({ base: 'USD', rates: { INR: 'n/a' } })).getRateTable('USD'),
    ).rejects.toThrow('ExchangeRate-API payload malformed for base USD');
  });

  it('should propagate transport errors', async () => {
    const http = { get: vi.fn().mockRejectedValue(new Error('socket hang up')) };

    await expect(new ExchangeRateApiProvider(http).getRateTable('USD')).rejects.toThrow('socket hang up');
  });
});

describe('createHttpClient', () => {
  it('should apply the per-call timeout with no base URL', () => {
    const client = createHttpClient({ timeoutMs: 1234 });

    expect(client.defaults.timeout).toBe(1234);
    expect(client.defaults.baseURL).toBeUndefined();
    expect(client.defaults.proxy).toBeUndefined();
  });

  it('should route through the proxy agent when a proxy URL is given', () => {
    const client = createHttpClient({ proxyUrl: 'http://127.0.0.1:8080' });

    expect(client.defaults.timeout).toBe(10_000);
    expect(client.defaults.proxy).toBe(false);
    expect(client.defaults.httpsAgent).toBeDefined();
  });
});
