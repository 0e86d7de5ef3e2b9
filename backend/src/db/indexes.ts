/**
 * Database Indexes
 * Run on startup after the connection is open
 */

import { mongoose } from './mongoose.js';
import type { Logger } from '../common/logger.js';
import { errorMessage } from '../common/errors.js';

const SERIES_COLLECTIONS = ['fuel_prices', 'currency_rates'] as const;

export async function ensureIndexes(logger: Logger): Promise<void> {
  const db = mongoose.connection.db;
  if (!db) {
    logger.warn({}, '[DB] No database connection, skipping indexes');
    return;
  }

  for (const name of SERIES_COLLECTIONS) {
    try {
      await db.collection(name).createIndex({ timestamp: -1 });
      await db.collection(name).createIndex({ source: 1, timestamp: -1 });
      logger.info({ collection: name }, '[DB] indexes ensured');
    } catch (err) {
      logger.warn({ collection: name, error: errorMessage(err) }, '[DB] index creation failed');
    }
  }
}
