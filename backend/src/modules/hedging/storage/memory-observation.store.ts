/**
 * IN-MEMORY OBSERVATION STORE — local runs without MongoDB, and tests
 */

import type { CurrencyObservation, FuelObservation } from '../contracts/hedging.types.js';
import { assertChronological, type ObservationStore } from './observation.store.js';

interface Row<T> {
  observation: T;
  cycleId: string;
}

export class InMemoryObservationStore implements ObservationStore {
  readonly name = 'memory';

  // Ascending by timestamp
  private fuel: Array<Row<FuelObservation>> = [];
  private currency: Array<Row<CurrencyObservation>> = [];

  async appendFuel(observation: FuelObservation, cycleId: string): Promise<void> {
    assertChronological('fuel_prices', this.fuel.at(-1)?.observation.timestamp, observation.timestamp);
    this.fuel.push({ observation: { ...observation }, cycleId });
  }

  async appendCurrency(observation: CurrencyObservation, cycleId: string): Promise<void> {
    assertChronological('currency_rates', this.currency.at(-1)?.observation.timestamp, observation.timestamp);
    this.currency.push({ observation: { ...observation }, cycleId });
  }

  async recentFuel(limit: number): Promise<FuelObservation[]> {
    return newestFirst(this.fuel, limit);
  }

  async recentCurrency(limit: number): Promise<CurrencyObservation[]> {
    return newestFirst(this.currency, limit);
  }

  async discardCycle(cycleId: string): Promise<number> {
    const before = this.fuel.length + this.currency.length;
    this.fuel = this.fuel.filter((row) => row.cycleId !== cycleId);
    this.currency = this.currency.filter((row) => row.cycleId !== cycleId);
    return before - this.fuel.length - this.currency.length;
  }

  size(): { fuel: number; currency: number } {
    return { fuel: this.fuel.length, currency: this.currency.length };
  }
}

function newestFirst<T>(rows: Array<Row<T>>, limit: number): T[] {
  if (limit <= 0) return [];
  return rows.slice(-limit).reverse().map((row) => ({ ...row.observation }));
}
