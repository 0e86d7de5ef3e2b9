/**
 * HEDGING DASHBOARD — view contract
 *
 * Everything the presentation layer needs, already derived. Timestamps are
 * ISO strings.
 */

import type {
  ChangeSet,
  CurrencyInstrument,
  CurrencySignalCode,
  FuelInstrument,
  FuelSignalCode,
  HedgingSignal,
  Instrument,
  ObservationSource,
} from './hedging.types.js';

export type HistoryStatus = 'OK' | 'INSUFFICIENT_HISTORY' | 'EMPTY';
export type FreshnessLevel = 'FRESH' | 'AGING' | 'STALE';

export interface HeadlineMetric {
  instrument: Instrument;
  label: string;
  value: number | null;
  display: string | null;
  /** Zero when the change could not be computed, see changeAvailable */
  changePct: number;
  changeDisplay: string;
  changeAvailable: boolean;
}

export interface Freshness {
  level: FreshnessLevel;
  ageSec: number;
  latestAt: string;
  label: string;
}

export interface ChartPoint {
  t: string;
  v: number;
}

export interface ChartSeries {
  instrument: Instrument;
  label: string;
  points: ChartPoint[];
}

export interface FuelRow {
  timestamp: string;
  jetFuel: number;
  brentCrude: number;
  wtiCrude: number;
  source: ObservationSource;
  provider: string;
}

export interface CurrencyRow {
  timestamp: string;
  usdInr: number;
  eurInr: number;
  gbpInr: number;
  jpyInr: number;
  source: ObservationSource;
  provider: string;
}

export interface Provenance {
  source: ObservationSource;
  provider: string;
  timestamp: string;
}

export interface DashboardOk {
  status: 'OK';
  generatedAt: string;
  metrics: HeadlineMetric[];
  changes: ChangeSet;
  signals: {
    fuel: HedgingSignal<FuelSignalCode>;
    currency: HedgingSignal<CurrencySignalCode>;
  };
  history: { fuel: HistoryStatus; currency: HistoryStatus };
  freshness: Freshness | null;
  fuelComparison: Array<{ instrument: FuelInstrument; label: string; value: number }>;
  currencyExposure: Array<{ instrument: CurrencyInstrument; label: string; rate: number; sharePct: number }>;
  recent: { fuel: FuelRow[]; currency: CurrencyRow[] };
  charts: { fuel: ChartSeries[]; currency: ChartSeries[] };
  provenance: { fuel: Provenance | null; currency: Provenance | null };
  dataSources: { fuel: readonly string[]; currency: readonly string[] };
}

export interface DashboardNoData {
  status: 'NO_DATA';
  generatedAt: string;
  message: string;
}

export interface DashboardUnavailable {
  status: 'UNAVAILABLE';
  generatedAt: string;
  message: string;
  error: string;
}

export type DashboardView = DashboardOk | DashboardNoData | DashboardUnavailable;
