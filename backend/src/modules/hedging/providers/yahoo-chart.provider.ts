/**
 * Yahoo Finance Chart Provider
 * Source: query1.finance.yahoo.com chart API (public, no key required)
 *
 * Serves both futures contracts (BZ=F, CL=F) and currency pairs (USDINR=X).
 * The latest non-empty close of the returned history is the quote.
 */

import { z } from 'zod';
import type { QuoteProvider } from '../contracts/hedging.types.js';
import type { HttpGetter } from './http.client.js';

const YAHOO_CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

const YahooChartSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({ symbol: z.string() }).passthrough(),
          indicators: z.object({
            quote: z.array(
              z.object({
                close: z.array(z.number().nullable()).optional(),
              }),
            ),
          }),
        }),
      )
      .nullable(),
    error: z
      .object({ code: z.string(), description: z.string() })
      .nullable()
      .optional(),
  }),
});

export class YahooChartProvider implements QuoteProvider {
  readonly name = 'yahoo';

  constructor(
    private readonly http: HttpGetter,
    private readonly range = '1d',
    private readonly interval = '1d',
  ) {}

  async getLatestClose(symbol: string, signal?: AbortSignal): Promise<number> {
    const response = await this.http.get<unknown>(`${YAHOO_CHART_URL}/${encodeURIComponent(symbol)}`, {
      params: { range: this.range, interval: this.interval },
      signal,
    });

    const parsed = YahooChartSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(`Yahoo chart payload malformed for ${symbol}`);
    }

    const { result, error } = parsed.data.chart;
    if (error) {
      throw new Error(`Yahoo chart error for ${symbol}: ${error.code} ${error.description}`);
    }

    const closes = result?.[0]?.indicators.quote[0]?.close ?? [];
    for (let i = closes.length - 1; i >= 0; i--) {
      const close = closes[i];
      if (typeof close === 'number' && Number.isFinite(close) && close > 0) {
        return close;
      }
    }

    throw new Error(`Yahoo chart returned no close for ${symbol}`);
  }
}
