/**
 * COLLECTION CRON JOB — scheduled collection cycles
 */

import cron, { type ScheduledTask } from 'node-cron';
import type { Logger } from '../../../common/logger.js';
import { errorMessage } from '../../../common/errors.js';
import type { HedgingCollector } from '../services/collector.service.js';

export function startCollectionCron(
  collector: HedgingCollector,
  expression: string,
  logger: Logger,
): ScheduledTask {
  if (!cron.validate(expression)) {
    throw new Error(`[CONFIG_FATAL] Invalid COLLECTION_CRON expression: "${expression}"`);
  }

  const task = cron.schedule(expression, async () => {
    try {
      const res = await collector.runCycle();
      logger.info({ cycleId: res.cycleId, ok: res.ok, skipReason: res.skipReason }, '[Collection Cron] tick done');
    } catch (e) {
      logger.error({ error: errorMessage(e) }, '[Collection Cron] tick failed');
    }
  });

  logger.info({ expression }, '[Collection Cron] started');
  return task;
}
