/**
 * DASHBOARD SERVICE — pure view builder
 *
 * Takes what the loader returned plus "now" and derives the whole dashboard
 * payload. No I/O, no global state; refresh is the caller re-invoking it.
 */

import {
  AGING_MAX_AGE_SEC,
  DATA_SOURCES,
  FRESH_MAX_AGE_SEC,
  RECENT_ROWS,
} from '../config/hedging.defaults.js';
import type {
  ChartSeries,
  CurrencyRow,
  DashboardOk,
  DashboardView,
  Freshness,
  FuelRow,
  HeadlineMetric,
  HistoryStatus,
  Provenance,
} from '../contracts/dashboard.contract.js';
import {
  CURRENCY_INSTRUMENTS,
  FUEL_INSTRUMENTS,
  type ChangeSet,
  type CurrencyInstrument,
  type CurrencyObservation,
  type FuelInstrument,
  type FuelObservation,
  type Instrument,
  type SeriesLoadResult,
} from '../contracts/hedging.types.js';
import { roundTo } from '../utils/numbers.js';
import { computeChangeSet, formatChangePct } from './change.service.js';
import { buildCurrencySignal, buildFuelSignal } from './signal.service.js';

export const INSTRUMENT_LABELS: Record<Instrument, string> = {
  jetFuel: 'Jet Fuel',
  brentCrude: 'Brent Crude',
  wtiCrude: 'WTI Crude',
  usdInr: 'USD/INR',
  eurInr: 'EUR/INR',
  gbpInr: 'GBP/INR',
  jpyInr: 'JPY/INR',
};

const UNAVAILABLE_MESSAGE = 'Unable to load data. Please check the database connection.';
const NO_DATA_MESSAGE = 'No data available. Run a collection cycle to fetch market data.';

export function formatPrice(instrument: Instrument, value: number): string {
  switch (instrument) {
    case 'jetFuel':
      return `$${value.toFixed(3)}`;
    case 'brentCrude':
    case 'wtiCrude':
      return `$${value.toFixed(2)}`;
    case 'jpyInr':
      return `₹${value.toFixed(6)}`;
    default:
      return `₹${value.toFixed(2)}`;
  }
}

export function historyStatus(length: number): HistoryStatus {
  if (length === 0) return 'EMPTY';
  if (length < 2) return 'INSUFFICIENT_HISTORY';
  return 'OK';
}

export function classifyFreshness(latestAt: Date, now: Date): Freshness {
  const ageSec = Math.max(0, Math.floor((now.getTime() - latestAt.getTime()) / 1000));
  const minutes = Math.floor(ageSec / 60);

  if (ageSec < FRESH_MAX_AGE_SEC) {
    return { level: 'FRESH', ageSec, latestAt: latestAt.toISOString(), label: `Data is fresh (updated ${minutes} minutes ago)` };
  }
  if (ageSec < AGING_MAX_AGE_SEC) {
    return { level: 'AGING', ageSec, latestAt: latestAt.toISOString(), label: `Data is ${minutes} minutes old` };
  }
  const hours = Math.floor(ageSec / 3600);
  return { level: 'STALE', ageSec, latestAt: latestAt.toISOString(), label: `Data is ${hours} hours old` };
}

function headline(instrument: Instrument, value: number | undefined, changes: ChangeSet): HeadlineMetric {
  const change = changes[instrument];
  return {
    instrument,
    label: INSTRUMENT_LABELS[instrument],
    value: value ?? null,
    display: value === undefined ? null : formatPrice(instrument, value),
    changePct: change ?? 0,
    changeDisplay: formatChangePct(change ?? 0),
    changeAvailable: change !== undefined,
  };
}

function toFuelRow(o: FuelObservation): FuelRow {
  return { ...o, timestamp: o.timestamp.toISOString() };
}

function toCurrencyRow(o: CurrencyObservation): CurrencyRow {
  return { ...o, timestamp: o.timestamp.toISOString() };
}

function provenanceOf(o: FuelObservation | CurrencyObservation | undefined): Provenance | null {
  if (!o) return null;
  return { source: o.source, provider: o.provider, timestamp: o.timestamp.toISOString() };
}

/** Oldest → newest, one series per instrument */
function chartSeries<K extends Instrument>(
  series: ReadonlyArray<Readonly<Record<K, number>> & { timestamp: Date }>,
  instruments: readonly K[],
): ChartSeries[] {
  const ascending = [...series].reverse();
  return instruments.map((instrument) => ({
    instrument,
    label: INSTRUMENT_LABELS[instrument],
    points: ascending.map((o) => ({ t: o.timestamp.toISOString(), v: o[instrument] })),
  }));
}

function latestTimestamp(fuel?: FuelObservation, currency?: CurrencyObservation): Date | null {
  const times = [fuel?.timestamp, currency?.timestamp].filter((t): t is Date => t instanceof Date);
  if (times.length === 0) return null;
  return new Date(Math.max(...times.map((t) => t.getTime())));
}

function currencyExposure(latest: CurrencyObservation | undefined): DashboardOk['currencyExposure'] {
  if (!latest) return [];
  const total = CURRENCY_INSTRUMENTS.reduce((sum, key) => sum + latest[key], 0);
  return CURRENCY_INSTRUMENTS.map((instrument: CurrencyInstrument) => ({
    instrument,
    label: INSTRUMENT_LABELS[instrument],
    rate: latest[instrument],
    sharePct: total > 0 ? roundTo((latest[instrument] / total) * 100, 2) : 0,
  }));
}

function fuelComparison(latest: FuelObservation | undefined): DashboardOk['fuelComparison'] {
  if (!latest) return [];
  return FUEL_INSTRUMENTS.map((instrument: FuelInstrument) => ({
    instrument,
    label: INSTRUMENT_LABELS[instrument],
    value: latest[instrument],
  }));
}

export function buildDashboardView(load: SeriesLoadResult, now: Date): DashboardView {
  const generatedAt = now.toISOString();

  if (load.status === 'UNAVAILABLE') {
    return { status: 'UNAVAILABLE', generatedAt, message: UNAVAILABLE_MESSAGE, error: load.error };
  }
  if (load.status === 'EMPTY') {
    return { status: 'NO_DATA', generatedAt, message: NO_DATA_MESSAGE };
  }

  const { fuel, currency } = load;
  // Either series may still be empty on its own
  const latestFuel: FuelObservation | undefined = fuel[0];
  const latestCurrency: CurrencyObservation | undefined = currency[0];
  const changes = computeChangeSet(fuel, currency);
  const latestAt = latestTimestamp(latestFuel, latestCurrency);

  return {
    status: 'OK',
    generatedAt,
    metrics: [
      headline('jetFuel', latestFuel?.jetFuel, changes),
      headline('usdInr', latestCurrency?.usdInr, changes),
      headline('brentCrude', latestFuel?.brentCrude, changes),
      headline('eurInr', latestCurrency?.eurInr, changes),
    ],
    changes,
    signals: {
      fuel: buildFuelSignal(changes),
      currency: buildCurrencySignal(changes),
    },
    history: {
      fuel: historyStatus(fuel.length),
      currency: historyStatus(currency.length),
    },
    freshness: latestAt ? classifyFreshness(latestAt, now) : null,
    fuelComparison: fuelComparison(latestFuel),
    currencyExposure: currencyExposure(latestCurrency),
    recent: {
      fuel: fuel.slice(0, RECENT_ROWS).map(toFuelRow),
      currency: currency.slice(0, RECENT_ROWS).map(toCurrencyRow),
    },
    charts: {
      fuel: chartSeries(fuel, FUEL_INSTRUMENTS),
      currency: chartSeries(currency, CURRENCY_INSTRUMENTS),
    },
    provenance: {
      fuel: provenanceOf(latestFuel),
      currency: provenanceOf(latestCurrency),
    },
    dataSources: DATA_SOURCES,
  };
}
