/**
 * Collection cycle: fetch → fallback → persist, lock and timeout guards
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { CurrencyObservation, FuelObservation } from '../contracts/hedging.types.js';
import { HedgingCollector, type ObservationFetcher } from '../services/collector.service.js';
import { CurrencyFetcher } from '../services/currency-fetcher.service.js';
import { FuelFetcher } from '../services/fuel-fetcher.service.js';
import { InMemoryObservationStore } from '../storage/memory-observation.store.js';
import {
  createMockLogger,
  currencyObs,
  deferred,
  FakeQuoteProvider,
  FakeRateTableProvider,
  fuelObs,
} from './fixtures.js';

const FUEL = fuelObs('2026-03-02T10:00:00.000Z', 105.3);
const CURRENCY = currencyObs('2026-03-02T10:00:00.000Z', 83);

function stubFetcher<T>(value: T): ObservationFetcher<T> {
  return { fetch: vi.fn(async () => value) };
}

/** Holds one series' append until the gate opens */
class GatedStore extends InMemoryObservationStore {
  constructor(
    private readonly gate: Promise<void>,
    private readonly gated: 'fuel' | 'currency',
  ) {
    super();
  }

  async appendFuel(observation: FuelObservation, cycleId: string): Promise<void> {
    if (this.gated === 'fuel') await this.gate;
    return super.appendFuel(observation, cycleId);
  }

  async appendCurrency(observation: CurrencyObservation, cycleId: string): Promise<void> {
    if (this.gated === 'currency') await this.gate;
    return super.appendCurrency(observation, cycleId);
  }
}

describe('HedgingCollector', () => {
  let logger: ReturnType<typeof createMockLogger>;
  let store: InMemoryObservationStore;

  beforeEach(() => {
    logger = createMockLogger();
    store = new InMemoryObservationStore();
  });

  it('should persist one observation per domain on a live cycle', async () => {
    const collector = new HedgingCollector({
      fuel: stubFetcher(FUEL),
      currency: stubFetcher(CURRENCY),
      store,
      logger,
      idFactory: () => 'cycle-1',
    });

    const result = await collector.runCycle();

    expect(result.ok).toBe(true);
    expect(result.cycleId).toBe('cycle-1');
    expect(result.message).toBe('Real-time data collected successfully!');
    expect(result.fuel).toEqual(FUEL);
    expect(result.currency).toEqual(CURRENCY);
    expect(store.size()).toEqual({ fuel: 1, currency: 1 });
    expect(collector.getLastResult()).toBe(result);
  });

  it('should still store fallback observations when every source fails', async () => {
    const failing = new Error('network down');
    const fuel = new FuelFetcher({ futures: new FakeQuoteProvider({ 'BZ=F': failing, 'CL=F': failing }), logger });
    const currency = new CurrencyFetcher({
      rateTable: new FakeRateTableProvider(failing),
      pairs: new FakeQuoteProvider({}),
      logger,
    });
    const collector = new HedgingCollector({ fuel, currency, store, logger });

    const result = await collector.runCycle();

    expect(result.ok).toBe(true);
    expect(result.message).toBe('Data collected (2 of 2 domains used fallback values)');
    expect(store.size()).toEqual({ fuel: 1, currency: 1 });

    const [storedFuel] = await store.recentFuel(1);
    const [storedCurrency] = await store.recentCurrency(1);
    expect(storedFuel.source).toBe('FALLBACK');
    expect(storedFuel.jetFuel).toBeGreaterThanOrEqual(2.3);
    expect(storedFuel.jetFuel).toBeLessThanOrEqual(2.6);
    expect(storedFuel.brentCrude).toBeGreaterThanOrEqual(60);
    expect(storedFuel.brentCrude).toBeLessThanOrEqual(70);
    expect(storedCurrency.source).toBe('FALLBACK');
    expect(storedCurrency.usdInr).toBeGreaterThanOrEqual(88);
    expect(storedCurrency.usdInr).toBeLessThanOrEqual(90);
    expect(storedCurrency.jpyInr).toBeGreaterThanOrEqual(0.57);
    expect(storedCurrency.jpyInr).toBeLessThanOrEqual(0.58);
  });

  it('should report a partial fallback in the message', async () => {
    const collector = new HedgingCollector({
      fuel: stubFetcher<FuelObservation>({ ...FUEL, source: 'FALLBACK', provider: 'fallback' }),
      currency: stubFetcher(CURRENCY),
      store,
      logger,
    });

    const result = await collector.runCycle();

    expect(result.message).toBe('Data collected (1 of 2 domains used fallback values)');
  });

  it('should skip a cycle started while another one runs', async () => {
    const gate = deferred<FuelObservation>();
    const fuel: ObservationFetcher<FuelObservation> = { fetch: vi.fn(() => gate.promise) };
    const currency = stubFetcher(CURRENCY);
    const ids = ['first', 'second'];
    const collector = new HedgingCollector({ fuel, currency, store, logger, idFactory: () => ids.shift() ?? 'x' });

    const first = collector.runCycle();
    expect(collector.isRunning()).toBe(true);

    const second = await collector.runCycle();
    expect(second).toMatchObject({ ok: false, cycleId: 'second', skipReason: 'LOCK_HELD', durationMs: 0 });
    expect(second.message).toBe('A collection cycle is already running');
    expect(fuel.fetch).toHaveBeenCalledTimes(1);

    gate.resolve(FUEL);
    const firstResult = await first;
    expect(firstResult.ok).toBe(true);
    expect(collector.isRunning()).toBe(false);
    expect(store.size()).toEqual({ fuel: 1, currency: 1 });
  });

  it('should time out and persist nothing, even if fetches finish later', async () => {
    const gate = deferred<FuelObservation>();
    let seen: AbortSignal | undefined;
    const fuel: ObservationFetcher<FuelObservation> = {
      fetch: (signal) => {
        seen = signal;
        return gate.promise;
      },
    };
    const collector = new HedgingCollector({
      fuel,
      currency: stubFetcher(CURRENCY),
      store,
      logger,
      cycleTimeoutMs: 20,
    });

    const result = await collector.runCycle();

    expect(result.ok).toBe(false);
    expect(result.skipReason).toBe('TIMEOUT');
    expect(result.message).toBe('Data collection timed out after 20ms');
    expect(seen?.aborted).toBe(true);

    // Still locked while the abandoned fetch is pending
    expect(collector.isRunning()).toBe(true);

    gate.resolve(FUEL);
    await collector.whenIdle();
    expect(store.size()).toEqual({ fuel: 0, currency: 0 });
    expect(collector.isRunning()).toBe(false);
  });

  it('should roll back a fuel row when the currency write outlasts the timeout', async () => {
    const gate = deferred<void>();
    const slowStore = new GatedStore(gate.promise, 'currency');
    const collector = new HedgingCollector({
      fuel: stubFetcher(FUEL),
      currency: stubFetcher(CURRENCY),
      store: slowStore,
      logger,
      cycleTimeoutMs: 20,
      idFactory: () => 'cycle-slow',
    });

    const result = await collector.runCycle();

    expect(result).toMatchObject({ ok: false, skipReason: 'TIMEOUT' });
    expect(slowStore.size()).toEqual({ fuel: 1, currency: 0 });
    expect(collector.isRunning()).toBe(true);

    const overlapping = await collector.runCycle();
    expect(overlapping.skipReason).toBe('LOCK_HELD');

    gate.resolve();
    await collector.whenIdle();

    expect(slowStore.size()).toEqual({ fuel: 0, currency: 0 });
    expect(collector.isRunning()).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      { cycleId: 'cycle-slow', removed: 2 },
      '[Collector] timed-out cycle rolled back',
    );
  });

  it('should not write currency when the fuel write outlasts the timeout', async () => {
    const gate = deferred<void>();
    const slowStore = new GatedStore(gate.promise, 'fuel');
    const collector = new HedgingCollector({
      fuel: stubFetcher(FUEL),
      currency: stubFetcher(CURRENCY),
      store: slowStore,
      logger,
      cycleTimeoutMs: 20,
    });

    const result = await collector.runCycle();
    expect(result.skipReason).toBe('TIMEOUT');

    gate.resolve();
    await collector.whenIdle();

    expect(slowStore.size()).toEqual({ fuel: 0, currency: 0 });
    expect(collector.getLastResult()?.skipReason).toBe('TIMEOUT');
  });

  it('should fail the cycle when a write fails and release the lock', async () => {
    const failingStore = new InMemoryObservationStore();
    vi.spyOn(failingStore, 'appendCurrency').mockRejectedValueOnce(new Error('disk full'));
    const collector = new HedgingCollector({
      fuel: stubFetcher(FUEL),
      currency: stubFetcher<CurrencyObservation>(CURRENCY),
      store: failingStore,
      logger,
    });

    const result = await collector.runCycle();

    expect(result).toMatchObject({
      ok: false,
      skipReason: 'PERSISTENCE_FAILED',
      message: 'Persistence failed: disk full',
      error: 'Persistence failed: disk full',
    });
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ skipReason: 'PERSISTENCE_FAILED' }),
      '[Collector] cycle failed, data discarded',
    );

    const retry = await collector.runCycle();
    expect(retry.ok).toBe(true);
  });
});
