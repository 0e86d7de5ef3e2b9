/**
 * HEDGING ROUTES
 *
 * Endpoints:
 * - GET  /api/hedging/dashboard — derived dashboard view
 * - POST /api/hedging/collect   — run one collection cycle now
 * - GET  /api/hedging/series    — raw newest-first series (?limit=1..100)
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '../../../common/errors.js';
import { SERIES_LIMIT } from '../config/hedging.defaults.js';
import type { CollectionResult } from '../contracts/hedging.types.js';
import type { HedgingModule } from '../index.js';
import { buildDashboardView } from '../services/dashboard.service.js';

const SeriesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(SERIES_LIMIT).default(SERIES_LIMIT),
});

const CYCLE_FAILURE_STATUS: Record<NonNullable<CollectionResult['skipReason']>, number> = {
  LOCK_HELD: 409,
  TIMEOUT: 504,
  PERSISTENCE_FAILED: 500,
};

export async function registerHedgingRoutes(app: FastifyInstance, hedging: HedgingModule): Promise<void> {

  /**
   * GET /api/hedging/dashboard
   */
  app.get('/api/hedging/dashboard', async (_req, reply) => {
    const load = await hedging.loadSeries();
    const view = buildDashboardView(load, hedging.clock.now());

    if (view.status === 'UNAVAILABLE') {
      return reply.status(503).send({
        ok: false,
        error: 'STORE_UNAVAILABLE',
        message: view.message,
        data: view,
      });
    }

    return reply.send({ ok: true, data: view });
  });

  /**
   * POST /api/hedging/collect
   */
  app.post('/api/hedging/collect', async (_req, reply) => {
    const result = await hedging.collector.runCycle();

    if (!result.ok) {
      const reason = result.skipReason ?? 'PERSISTENCE_FAILED';
      return reply.status(CYCLE_FAILURE_STATUS[reason]).send({
        ok: false,
        error: reason,
        message: result.message,
        data: result,
      });
    }

    return reply.send({ ok: true, data: result });
  });

  /**
   * GET /api/hedging/series
   */
  app.get('/api/hedging/series', async (req, reply) => {
    const parsed = SeriesQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
    }

    const load = await hedging.loadSeries(parsed.data.limit);
    if (load.status === 'UNAVAILABLE') {
      return reply.status(503).send({ ok: false, error: 'STORE_UNAVAILABLE', message: load.error });
    }

    return reply.send({
      ok: true,
      data: {
        status: load.status,
        fuel: load.fuel,
        currency: load.currency,
      },
    });
  });

  /**
   * GET /api/hedging/status — last cycle and lock state
   */
  app.get('/api/hedging/status', async (_req, reply) => {
    return reply.send({
      ok: true,
      data: {
        running: hedging.collector.isRunning(),
        lastCycle: hedging.collector.getLastResult(),
        store: hedging.store.name,
      },
    });
  });
}
