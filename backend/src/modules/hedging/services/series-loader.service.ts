/**
 * SERIES LOADER — newest records of both series for the dashboard
 *
 * Read failures are reported in the result, never thrown, so the caller can
 * render a "cannot load" state instead of crashing.
 */

import type { Logger } from '../../../common/logger.js';
import { errorMessage } from '../../../common/errors.js';
import { SERIES_LIMIT } from '../config/hedging.defaults.js';
import type { SeriesLoadResult } from '../contracts/hedging.types.js';
import type { ObservationStore } from '../storage/observation.store.js';

export async function loadRecentSeries(
  store: ObservationStore,
  logger: Logger,
  limit: number = SERIES_LIMIT,
): Promise<SeriesLoadResult> {
  try {
    const fuel = await store.recentFuel(limit);
    const currency = await store.recentCurrency(limit);

    if (fuel.length === 0 && currency.length === 0) {
      logger.info({ store: store.name }, '[SeriesLoader] store is empty');
      return { status: 'EMPTY', fuel: [], currency: [] };
    }

    return { status: 'OK', fuel, currency };
  } catch (err) {
    const error = errorMessage(err);
    logger.error({ store: store.name, error }, '[SeriesLoader] failed to load series');
    return { status: 'UNAVAILABLE', error };
  }
}
