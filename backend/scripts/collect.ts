/**
 * Standalone collector — runs exactly one collection cycle and exits.
 *
 * Run: npx tsx backend/scripts/collect.ts
 * Exit code 0 on success, 1 on failure.
 */

import 'dotenv/config';
import { v4 as uuidv4 } from 'uuid';
import { getEnv } from '../src/config/env.js';
import { createLogger } from '../src/common/logger.js';
import { errorMessage } from '../src/common/errors.js';
import { connectMongo, disconnectMongo } from '../src/db/mongoose.js';
import {
  createHedgingModule,
  InMemoryObservationStore,
  MongoObservationStore,
  type ObservationStore,
} from '../src/modules/hedging/index.js';
import { formatCycleSummary, storeFailureResult } from '../src/modules/hedging/services/cycle-summary.js';

async function main(): Promise<number> {
  const env = getEnv();
  const logger = createLogger(env.LOG_LEVEL, 'collector');
  const startedAt = new Date();

  try {
    let store: ObservationStore;
    if (env.STORE_DRIVER === 'mongo') {
      try {
        await connectMongo(env.MONGO_URL, logger);
      } catch (err) {
        logger.error({ error: errorMessage(err) }, '[Collector] store unreachable, cycle not started');
        console.log(formatCycleSummary(storeFailureResult(uuidv4(), startedAt, err)));
        return 1;
      }
      store = new MongoObservationStore();
    } else {
      logger.warn({}, '[Collector] STORE_DRIVER=memory, this run will not be persisted');
      store = new InMemoryObservationStore();
    }

    const hedging = createHedgingModule({
      store,
      logger,
      httpTimeoutMs: env.HTTP_TIMEOUT_MS,
      cycleTimeoutMs: env.CYCLE_TIMEOUT_MS,
      proxyUrl: env.HTTPS_PROXY,
    });

    console.log('Fetching live fuel prices and currency rates...');
    const result = await hedging.collector.runCycle();
    console.log(formatCycleSummary(result));
    // A timed-out cycle may still be rolling back its writes
    await hedging.collector.whenIdle();
    return result.ok ? 0 : 1;
  } finally {
    await disconnectMongo(logger);
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error('ERROR: collector crashed:', err);
    process.exit(1);
  });
