/**
 * OBSERVATION STORE — port for the two append-only series
 */

import type { CurrencyObservation, FuelObservation } from '../contracts/hedging.types.js';

export interface ObservationStore {
  readonly name: string;
  /** Single all-or-nothing append, tagged with the cycle that produced it */
  appendFuel(observation: FuelObservation, cycleId: string): Promise<void>;
  appendCurrency(observation: CurrencyObservation, cycleId: string): Promise<void>;
  /** Remove every row written by one cycle; returns the number removed */
  discardCycle(cycleId: string): Promise<number>;
  /** Newest first */
  recentFuel(limit: number): Promise<FuelObservation[]>;
  recentCurrency(limit: number): Promise<CurrencyObservation[]>;
}

export class SeriesOrderError extends Error {
  constructor(series: string, latest: Date, incoming: Date) {
    super(
      `${series}: observation at ${incoming.toISOString()} is older than latest ${latest.toISOString()}`,
    );
    this.name = 'SeriesOrderError';
  }
}

/** Series are append-only in time order */
export function assertChronological(series: string, latest: Date | undefined, incoming: Date): void {
  if (latest && incoming.getTime() < latest.getTime()) {
    throw new SeriesOrderError(series, latest, incoming);
  }
}
