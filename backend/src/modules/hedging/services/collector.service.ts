/**
 * COLLECTOR SERVICE — one collection cycle: fetch → fallback → persist
 *
 * Guards:
 * - in-process lock: a cycle started while another runs is skipped (LOCK_HELD)
 * - hard timeout over the whole cycle (TIMEOUT); a timed-out cycle persists nothing,
 *   and rows it wrote before noticing the abort are discarded again
 *
 * Fetchers never reject (they fall back), so only persistence or the timeout
 * can fail a cycle.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../../../common/logger.js';
import { errorMessage } from '../../../common/errors.js';
import { CYCLE_TIMEOUT_MS } from '../config/hedging.defaults.js';
import type {
  CollectionResult,
  CurrencyObservation,
  FuelObservation,
} from '../contracts/hedging.types.js';
import type { ObservationStore } from '../storage/observation.store.js';

export interface ObservationFetcher<T> {
  fetch(signal?: AbortSignal): Promise<T>;
}

export interface CollectorDeps {
  fuel: ObservationFetcher<FuelObservation>;
  currency: ObservationFetcher<CurrencyObservation>;
  store: ObservationStore;
  logger: Logger;
  cycleTimeoutMs?: number;
  idFactory?: () => string;
}

class CycleTimeoutError extends Error {
  constructor(ms: number) {
    super(`Data collection timed out after ${ms}ms`);
    this.name = 'CycleTimeoutError';
  }
}

class PersistenceError extends Error {
  constructor(cause: unknown) {
    super(`Persistence failed: ${errorMessage(cause)}`);
    this.name = 'PersistenceError';
  }
}

export class HedgingCollector {
  private running = false;
  private idle: Promise<void> = Promise.resolve();
  private lastResult: CollectionResult | null = null;
  private readonly cycleTimeoutMs: number;
  private readonly idFactory: () => string;

  constructor(private readonly deps: CollectorDeps) {
    this.cycleTimeoutMs = deps.cycleTimeoutMs ?? CYCLE_TIMEOUT_MS;
    this.idFactory = deps.idFactory ?? (() => uuidv4());
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Resolves once the current cycle's work has settled, including a timed-out one */
  whenIdle(): Promise<void> {
    return this.idle;
  }

  getLastResult(): CollectionResult | null {
    return this.lastResult;
  }

  async runCycle(): Promise<CollectionResult> {
    const { logger } = this.deps;
    const cycleId = this.idFactory();
    const startedAt = new Date();

    if (this.running) {
      logger.warn({ cycleId }, '[Collector] cycle already running, skipping');
      return {
        ok: false,
        cycleId,
        message: 'A collection cycle is already running',
        startedAt: startedAt.toISOString(),
        durationMs: 0,
        skipReason: 'LOCK_HELD',
      };
    }

    this.running = true;
    const controller = new AbortController();
    logger.info({ cycleId }, '[Collector] starting collection cycle');

    // The lock follows the work, not the timeout: a timed-out cycle keeps it
    // until its in-flight fetches and writes have settled.
    const work = this.collectAndPersist(cycleId, controller.signal);
    const release = () => {
      this.running = false;
    };
    this.idle = work.then(release, release);

    try {
      const { fuel, currency } = await this.withTimeout(work, controller);
      await this.idle;
      const durationMs = Date.now() - startedAt.getTime();
      const synthetic = [fuel, currency].filter((o) => o.source === 'FALLBACK').length;

      logger.info(
        { cycleId, durationMs, fuelProvider: fuel.provider, currencyProvider: currency.provider },
        '[Collector] cycle completed',
      );

      return this.remember({
        ok: true,
        cycleId,
        message:
          synthetic > 0
            ? `Data collected (${synthetic} of 2 domains used fallback values)`
            : 'Real-time data collected successfully!',
        startedAt: startedAt.toISOString(),
        durationMs,
        fuel,
        currency,
      });
    } catch (err) {
      const timedOut = err instanceof CycleTimeoutError;
      if (!timedOut) {
        await this.idle;
      }
      const durationMs = Date.now() - startedAt.getTime();
      const error = errorMessage(err);
      const skipReason = timedOut ? 'TIMEOUT' : 'PERSISTENCE_FAILED';

      logger.error({ cycleId, durationMs, skipReason, error }, '[Collector] cycle failed, data discarded');

      return this.remember({
        ok: false,
        cycleId,
        message: error,
        startedAt: startedAt.toISOString(),
        durationMs,
        skipReason,
        error,
      });
    }
  }

  private async collectAndPersist(
    cycleId: string,
    signal: AbortSignal,
  ): Promise<{ fuel: FuelObservation; currency: CurrencyObservation }> {
    const { store, logger } = this.deps;

    // Independent domains; both resolve (live or fallback) before anything is written
    const [fuel, currency] = await Promise.all([
      this.deps.fuel.fetch(signal),
      this.deps.currency.fetch(signal),
    ]);
    this.throwIfAborted(signal);

    try {
      await store.appendFuel(fuel, cycleId);
      this.throwIfAborted(signal);
      await store.appendCurrency(currency, cycleId);
      this.throwIfAborted(signal);
    } catch (err) {
      if (signal.aborted) {
        await this.rollback(cycleId);
        throw new CycleTimeoutError(this.cycleTimeoutMs);
      }
      throw new PersistenceError(err);
    }

    logger.info({ cycleId, store: store.name }, '[Collector] observations stored');
    return { fuel, currency };
  }

  /** Writes that landed after the cycle timed out are removed again */
  private async rollback(cycleId: string): Promise<void> {
    const { store, logger } = this.deps;
    try {
      const removed = await store.discardCycle(cycleId);
      logger.warn({ cycleId, removed }, '[Collector] timed-out cycle rolled back');
    } catch (err) {
      logger.error({ cycleId, error: errorMessage(err) }, '[Collector] rollback of timed-out cycle failed');
    }
  }

  private throwIfAborted(signal: AbortSignal): void {
    if (signal.aborted) {
      throw new CycleTimeoutError(this.cycleTimeoutMs);
    }
  }

  private async withTimeout<T>(work: Promise<T>, controller: AbortController): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new CycleTimeoutError(this.cycleTimeoutMs));
      }, this.cycleTimeoutMs);
    });

    try {
      return await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private remember(result: CollectionResult): CollectionResult {
    this.lastResult = result;
    return result;
  }
}
