/**
 * FUEL FETCHER — Brent/WTI futures with a derived jet-fuel proxy
 */

import type { Logger } from '../../../common/logger.js';
import {
  CYCLE_TIMEOUT_MS,
  DECIMALS,
  FUTURES_SYMBOLS,
  JET_FUEL_MULTIPLIER,
} from '../config/hedging.defaults.js';
import {
  systemClock,
  type Clock,
  type FuelObservation,
  type QuoteProvider,
  type RandomSource,
} from '../contracts/hedging.types.js';
import { isPositiveFinite, roundTo } from '../utils/numbers.js';
import { generateFallbackFuel } from './fallback.service.js';
import { runSourceChain, type DataSource } from './source-chain.js';

/**
 * Jet fuel is never quoted directly: mean of the two crude benchmarks times a
 * fixed proxy multiplier, rounded to 6 decimals.
 */
export function deriveJetFuel(brentCrude: number, wtiCrude: number): number {
  return roundTo(((brentCrude + wtiCrude) / 2) * JET_FUEL_MULTIPLIER, DECIMALS.jetFuel);
}

export function buildFuelObservation(
  brentCrude: number,
  wtiCrude: number,
  timestamp: Date,
  provider: string,
): FuelObservation {
  if (!isPositiveFinite(brentCrude) || !isPositiveFinite(wtiCrude)) {
    throw new Error(`Invalid crude prices: brent=${brentCrude}, wti=${wtiCrude}`);
  }
  return {
    timestamp,
    jetFuel: deriveJetFuel(brentCrude, wtiCrude),
    brentCrude: roundTo(brentCrude, DECIMALS.brentCrude),
    wtiCrude: roundTo(wtiCrude, DECIMALS.wtiCrude),
    source: 'LIVE',
    provider,
  };
}

export interface FuelFetcherDeps {
  futures: QuoteProvider;
  logger: Logger;
  clock?: Clock;
  random?: RandomSource;
  chainTimeoutMs?: number;
}

export class FuelFetcher {
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly chainTimeoutMs: number;

  constructor(private readonly deps: FuelFetcherDeps) {
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? Math.random;
    this.chainTimeoutMs = deps.chainTimeoutMs ?? CYCLE_TIMEOUT_MS;
  }

  /** Ordered fuel sources; currently a single futures provider */
  sources(): Array<DataSource<FuelObservation>> {
    const { futures } = this.deps;
    return [
      {
        name: `${futures.name}-futures`,
        fetch: async (signal) => {
          const brent = await futures.getLatestClose(FUTURES_SYMBOLS.brentCrude, signal);
          const wti = await futures.getLatestClose(FUTURES_SYMBOLS.wtiCrude, signal);
          return buildFuelObservation(brent, wti, this.clock.now(), `${futures.name}-futures`);
        },
      },
    ];
  }

  /** Resolves with a live or fallback observation; never rejects */
  async fetch(signal?: AbortSignal): Promise<FuelObservation> {
    const { logger } = this.deps;
    logger.info({ domain: 'fuel' }, '[FuelFetcher] fetching live fuel prices');

    const result = await runSourceChain('fuel', this.sources(), {
      logger,
      deadlineMs: this.chainTimeoutMs,
      signal,
    });

    if (result.ok) {
      logger.info({ domain: 'fuel', source: result.source, observation: result.value }, '[FuelFetcher] live fuel prices collected');
      return result.value;
    }

    const fallback = generateFallbackFuel(this.clock, this.random);
    logger.error(
      { domain: 'fuel', attempts: result.attempts, observation: fallback },
      '[FuelFetcher] all sources failed, using fallback values',
    );
    return fallback;
  }
}
