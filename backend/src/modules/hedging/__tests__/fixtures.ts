/**
 * Shared test doubles for the hedging module
 */

import { vi } from 'vitest';
import type {
  Clock,
  CurrencyObservation,
  FuelObservation,
  QuoteProvider,
  RateTable,
  RateTableProvider,
} from '../contracts/hedging.types.js';

export function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export function fixedClock(iso: string): Clock {
  return { now: () => new Date(iso) };
}

/** Quote per symbol; missing symbol or an Error value makes the call fail */
export class FakeQuoteProvider implements QuoteProvider {
  readonly calls: string[] = [];

  constructor(
    private readonly quotes: Record<string, number | Error>,
    readonly name = 'yahoo',
  ) {}

  async getLatestClose(symbol: string): Promise<number> {
    this.calls.push(symbol);
    const quote = this.quotes[symbol];
    if (quote === undefined) throw new Error(`no quote for ${symbol}`);
    if (quote instanceof Error) throw quote;
    return quote;
  }
}

export class FakeRateTableProvider implements RateTableProvider {
  readonly name = 'exchangerate-api';
  calls = 0;

  constructor(private readonly table: RateTable | Error) {}

  async getRateTable(): Promise<RateTable> {
    this.calls++;
    if (this.table instanceof Error) throw this.table;
    return this.table;
  }
}

export function fuelObs(iso: string, jetFuel: number, brentCrude = 80, wtiCrude = 76): FuelObservation {
  return { timestamp: new Date(iso), jetFuel, brentCrude, wtiCrude, source: 'LIVE', provider: 'yahoo-futures' };
}

export function currencyObs(
  iso: string,
  usdInr: number,
  eurInr = 96,
  gbpInr = 110,
  jpyInr = 10,
): CurrencyObservation {
  return { timestamp: new Date(iso), usdInr, eurInr, gbpInr, jpyInr, source: 'LIVE', provider: 'exchangerate-api' };
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
