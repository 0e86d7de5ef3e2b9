/**
 * CURRENCY FETCHER — INR cross rates
 *
 * Source order:
 * 1. USD rate table → X/INR = (USD/INR) / (USD/X)
 * 2. Direct pair quotes; USD/INR required, other pairs fall back to literals
 */

import type { Logger } from '../../../common/logger.js';
import { errorMessage } from '../../../common/errors.js';
import {
  CYCLE_TIMEOUT_MS,
  DECIMALS,
  PAIR_DEFAULTS,
  PAIR_SYMBOLS,
  RATE_TABLE_BASE,
} from '../config/hedging.defaults.js';
import {
  systemClock,
  type Clock,
  type CurrencyObservation,
  type QuoteProvider,
  type RandomSource,
  type RateTable,
  type RateTableProvider,
} from '../contracts/hedging.types.js';
import { isPositiveFinite, roundTo } from '../utils/numbers.js';
import { generateFallbackCurrency } from './fallback.service.js';
import { runSourceChain, type DataSource } from './source-chain.js';

const TABLE_CODES = ['INR', 'EUR', 'GBP', 'JPY'] as const;

/**
 * Rebuild INR cross rates from a USD-based table.
 * Throws when any of the four codes is missing or not a positive number.
 */
export function crossRatesFromUsdTable(
  table: RateTable,
  timestamp: Date,
  provider: string,
): CurrencyObservation {
  if (table.base.toUpperCase() !== RATE_TABLE_BASE) {
    throw new Error(`Rate table base is ${table.base}, expected ${RATE_TABLE_BASE}`);
  }

  const missing = TABLE_CODES.filter((code) => !isPositiveFinite(table.rates[code]));
  if (missing.length > 0) {
    throw new Error(`Rate table incomplete, missing: ${missing.join(', ')}`);
  }

  const inr = table.rates.INR;
  return {
    timestamp,
    usdInr: roundTo(inr, DECIMALS.usdInr),
    eurInr: roundTo(inr / table.rates.EUR, DECIMALS.eurInr),
    gbpInr: roundTo(inr / table.rates.GBP, DECIMALS.gbpInr),
    jpyInr: roundTo(inr / table.rates.JPY, DECIMALS.jpyInr),
    source: 'LIVE',
    provider,
  };
}

export interface CurrencyFetcherDeps {
  rateTable: RateTableProvider;
  pairs: QuoteProvider;
  logger: Logger;
  clock?: Clock;
  random?: RandomSource;
  chainTimeoutMs?: number;
}

export class CurrencyFetcher {
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly chainTimeoutMs: number;

  constructor(private readonly deps: CurrencyFetcherDeps) {
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? Math.random;
    this.chainTimeoutMs = deps.chainTimeoutMs ?? CYCLE_TIMEOUT_MS;
  }

  sources(): Array<DataSource<CurrencyObservation>> {
    const { rateTable, pairs } = this.deps;
    return [
      {
        name: rateTable.name,
        fetch: async (signal) => {
          const table = await rateTable.getRateTable(RATE_TABLE_BASE, signal);
          return crossRatesFromUsdTable(table, this.clock.now(), rateTable.name);
        },
      },
      {
        name: `${pairs.name}-fx`,
        fetch: (signal) => this.fetchDirectPairs(signal),
      },
    ];
  }

  async fetch(signal?: AbortSignal): Promise<CurrencyObservation> {
    const { logger } = this.deps;
    logger.info({ domain: 'currency' }, '[CurrencyFetcher] fetching live currency rates');

    const result = await runSourceChain('currency', this.sources(), {
      logger,
      deadlineMs: this.chainTimeoutMs,
      signal,
    });

    if (result.ok) {
      logger.info(
        { domain: 'currency', source: result.source, observation: result.value },
        '[CurrencyFetcher] live currency rates collected',
      );
      return result.value;
    }

    const fallback = generateFallbackCurrency(this.clock, this.random);
    logger.error(
      { domain: 'currency', attempts: result.attempts, observation: fallback },
      '[CurrencyFetcher] all sources failed, using fallback values',
    );
    return fallback;
  }

  /**
   * Direct pair quotes. USD/INR failing fails the source; each other pair
   * that fails on its own takes its literal default.
   */
  private async fetchDirectPairs(signal: AbortSignal): Promise<CurrencyObservation> {
    const { pairs, logger } = this.deps;
    const provider = `${pairs.name}-fx`;

    const usdInr = await pairs.getLatestClose(PAIR_SYMBOLS.usdInr, signal);
    if (!isPositiveFinite(usdInr)) {
      throw new Error(`Invalid USD/INR quote: ${usdInr}`);
    }

    const quoteOrDefault = async (key: keyof typeof PAIR_DEFAULTS): Promise<number> => {
      try {
        const value = await pairs.getLatestClose(PAIR_SYMBOLS[key], signal);
        if (isPositiveFinite(value)) return roundTo(value, DECIMALS[key]);
        logger.warn({ domain: 'currency', source: provider, pair: key, value }, '[CurrencyFetcher] invalid pair quote, using default');
      } catch (err) {
        logger.warn(
          { domain: 'currency', source: provider, pair: key, error: errorMessage(err) },
          '[CurrencyFetcher] pair quote failed, using default',
        );
      }
      return PAIR_DEFAULTS[key];
    };

    const eurInr = await quoteOrDefault('eurInr');
    const gbpInr = await quoteOrDefault('gbpInr');
    const jpyInr = await quoteOrDefault('jpyInr');

    return {
      timestamp: this.clock.now(),
      usdInr: roundTo(usdInr, DECIMALS.usdInr),
      eurInr,
      gbpInr,
      jpyInr,
      source: 'LIVE',
      provider,
    };
  }
}
