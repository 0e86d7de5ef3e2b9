/**
 * ExchangeRate-API Provider
 * Source: api.exchangerate-api.com v4 (public, no key required)
 *
 * Endpoint: https://api.exchangerate-api.com/v4/latest/{BASE}
 */

import { z } from 'zod';
import type { RateTable, RateTableProvider } from '../contracts/hedging.types.js';
import type { HttpGetter } from './http.client.js';

const EXCHANGE_RATE_API_URL = 'https://api.exchangerate-api.com/v4/latest';

const RateTableSchema = z.object({
  base: z.string(),
  rates: z.record(z.string(), z.number()),
});

export class ExchangeRateApiProvider implements RateTableProvider {
  readonly name = 'exchangerate-api';

  constructor(private readonly http: HttpGetter) {}

  async getRateTable(base: string, signal?: AbortSignal): Promise<RateTable> {
    const response = await this.http.get<unknown>(`${EXCHANGE_RATE_API_URL}/${encodeURIComponent(base)}`, {
      signal,
    });

    const parsed = RateTableSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(`ExchangeRate-API payload malformed for base ${base}`);
    }
    if (Object.keys(parsed.data.rates).length === 0) {
      throw new Error(`ExchangeRate-API returned an empty rate table for base ${base}`);
    }

    return parsed.data;
  }
}
