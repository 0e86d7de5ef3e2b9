/**
 * Server entrypoint
 *
 * Run: npx tsx backend/src/server.ts
 */

import 'dotenv/config';
import type { ScheduledTask } from 'node-cron';
import { buildApp } from './app.js';
import { getEnv } from './config/env.js';
import { createLogger } from './common/logger.js';
import { errorMessage } from './common/errors.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { ensureIndexes } from './db/indexes.js';
import {
  createHedgingModule,
  InMemoryObservationStore,
  MongoObservationStore,
  startCollectionCron,
  type ObservationStore,
} from './modules/hedging/index.js';

async function main(): Promise<void> {
  const env = getEnv();
  const logger = createLogger(env.LOG_LEVEL, 'hedging');

  let store: ObservationStore;
  if (env.STORE_DRIVER === 'mongo') {
    await connectMongo(env.MONGO_URL, logger);
    await ensureIndexes(logger);
    store = new MongoObservationStore();
  } else {
    logger.warn({}, '[BOOT] STORE_DRIVER=memory, observations are lost on restart');
    store = new InMemoryObservationStore();
  }

  const hedging = createHedgingModule({
    store,
    logger,
    httpTimeoutMs: env.HTTP_TIMEOUT_MS,
    cycleTimeoutMs: env.CYCLE_TIMEOUT_MS,
    seriesLimit: env.SERIES_LIMIT,
    proxyUrl: env.HTTPS_PROXY,
  });

  const app = buildApp({ env, hedging });

  let cronTask: ScheduledTask | null = null;
  if (env.COLLECTION_CRON_ENABLED) {
    cronTask = startCollectionCron(hedging.collector, env.COLLECTION_CRON, app.log);
  }

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, '[BOOT] shutting down');
    cronTask?.stop();
    try {
      await app.close();
      await disconnectMongo(app.log);
      process.exit(0);
    } catch (err) {
      app.log.error({ error: errorMessage(err) }, '[BOOT] shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await app.listen({ port: env.PORT, host: env.HOST });
}

main().catch((err) => {
  console.error('[BOOT] Fatal boot error:', err);
  process.exit(1);
});
