/**
 * CHANGE CALCULATOR — period-over-period percentage deltas
 *
 * Works on newest-first series and compares records [0] and [1] only.
 * Values are kept at full precision; rounding happens at display time.
 */

import {
  CURRENCY_INSTRUMENTS,
  FUEL_INSTRUMENTS,
  type ChangeSet,
  type CurrencyObservation,
  type FuelObservation,
  type Instrument,
} from '../contracts/hedging.types.js';

export function percentChange(latest: number, previous: number): number | undefined {
  if (!Number.isFinite(latest) || !Number.isFinite(previous) || previous === 0) {
    return undefined;
  }
  return ((latest - previous) / previous) * 100;
}

/**
 * Changes for the given instruments of one series. Keys are absent when the
 * series has fewer than two records or the previous value is zero.
 */
export function computeSeriesChanges<K extends string>(
  series: ReadonlyArray<Readonly<Record<K, number>>>,
  instruments: readonly K[],
): Partial<Record<K, number>> {
  const changes: Partial<Record<K, number>> = {};
  if (series.length < 2) return changes;

  const [latest, previous] = series;
  for (const key of instruments) {
    const change = percentChange(latest[key], previous[key]);
    if (change !== undefined) {
      changes[key] = change;
    }
  }
  return changes;
}

export function computeChangeSet(
  fuel: readonly FuelObservation[],
  currency: readonly CurrencyObservation[],
): ChangeSet {
  return {
    ...computeSeriesChanges(fuel, FUEL_INSTRUMENTS),
    ...computeSeriesChanges(currency, CURRENCY_INSTRUMENTS),
  };
}

/** Zero default for display and signal classification */
export function changeOrZero(changes: ChangeSet, instrument: Instrument): number {
  return changes[instrument] ?? 0;
}

/** e.g. 1.9999999 → "+2.00%" */
export function formatChangePct(change: number, decimals = 2): string {
  const fixed = change.toFixed(decimals);
  const sign = change >= 0 && !fixed.startsWith('-') ? '+' : '';
  return `${sign}${fixed}%`;
}
