/**
 * HEDGING MODULE INDEX — composition root and route registration
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../common/logger.js';
import { registerHedgingRoutes } from './api/hedging.routes.js';
import { CYCLE_TIMEOUT_MS, HTTP_TIMEOUT_MS, SERIES_LIMIT } from './config/hedging.defaults.js';
import {
  systemClock,
  type Clock,
  type QuoteProvider,
  type RandomSource,
  type RateTableProvider,
  type SeriesLoadResult,
} from './contracts/hedging.types.js';
import { ExchangeRateApiProvider } from './providers/exchange-rate.provider.js';
import { createHttpClient } from './providers/http.client.js';
import { YahooChartProvider } from './providers/yahoo-chart.provider.js';
import { HedgingCollector } from './services/collector.service.js';
import { CurrencyFetcher } from './services/currency-fetcher.service.js';
import { FuelFetcher } from './services/fuel-fetcher.service.js';
import { loadRecentSeries } from './services/series-loader.service.js';
import type { ObservationStore } from './storage/observation.store.js';

export interface HedgingModuleOptions {
  store: ObservationStore;
  logger: Logger;
  httpTimeoutMs?: number;
  cycleTimeoutMs?: number;
  seriesLimit?: number;
  proxyUrl?: string;
  clock?: Clock;
  random?: RandomSource;
  /** Overrides for the upstream providers (tests, alternative feeds) */
  providers?: {
    futures?: QuoteProvider;
    pairs?: QuoteProvider;
    rateTable?: RateTableProvider;
  };
}

export interface HedgingModule {
  collector: HedgingCollector;
  store: ObservationStore;
  clock: Clock;
  loadSeries(limit?: number): Promise<SeriesLoadResult>;
}

export function createHedgingModule(options: HedgingModuleOptions): HedgingModule {
  const { store, logger } = options;
  const clock = options.clock ?? systemClock;
  const cycleTimeoutMs = options.cycleTimeoutMs ?? CYCLE_TIMEOUT_MS;
  const seriesLimit = options.seriesLimit ?? SERIES_LIMIT;

  const http = createHttpClient({
    timeoutMs: options.httpTimeoutMs ?? HTTP_TIMEOUT_MS,
    proxyUrl: options.proxyUrl,
  });
  const yahoo = new YahooChartProvider(http);
  const futures = options.providers?.futures ?? yahoo;
  const pairs = options.providers?.pairs ?? yahoo;
  const rateTable = options.providers?.rateTable ?? new ExchangeRateApiProvider(http);

  const fuel = new FuelFetcher({
    futures,
    logger,
    clock,
    random: options.random,
    chainTimeoutMs: cycleTimeoutMs,
  });
  const currency = new CurrencyFetcher({
    rateTable,
    pairs,
    logger,
    clock,
    random: options.random,
    chainTimeoutMs: cycleTimeoutMs,
  });

  const collector = new HedgingCollector({
    fuel,
    currency,
    store,
    logger,
    cycleTimeoutMs,
  });

  return {
    collector,
    store,
    clock,
    loadSeries: (limit = seriesLimit) => loadRecentSeries(store, logger, limit),
  };
}

export async function registerHedgingModule(fastify: FastifyInstance, hedging: HedgingModule): Promise<void> {
  await registerHedgingRoutes(fastify, hedging);
  fastify.log.info({ store: hedging.store.name }, '[Hedging] module registered at /api/hedging/*');
}

export * from './contracts/hedging.types.js';
export * from './contracts/dashboard.contract.js';
export { buildDashboardView } from './services/dashboard.service.js';
export { MongoObservationStore } from './storage/mongo-observation.store.js';
export { InMemoryObservationStore } from './storage/memory-observation.store.js';
export type { ObservationStore } from './storage/observation.store.js';
export { startCollectionCron } from './jobs/collection.job.js';
