/**
 * HEDGING MODULE — Contracts
 */

// ═══════════════════════════════════════════════════════════════
// OBSERVATIONS
// ═══════════════════════════════════════════════════════════════

/** LIVE when a market source answered, FALLBACK when the values are synthetic */
export type ObservationSource = 'LIVE' | 'FALLBACK';

export interface FuelObservation {
  timestamp: Date;
  /** $/gal proxy, always derived from the two crude benchmarks */
  jetFuel: number;
  /** $/bbl */
  brentCrude: number;
  /** $/bbl */
  wtiCrude: number;
  source: ObservationSource;
  provider: string;
}

/** INR per one unit of the foreign currency */
export interface CurrencyObservation {
  timestamp: Date;
  usdInr: number;
  eurInr: number;
  gbpInr: number;
  jpyInr: number;
  source: ObservationSource;
  provider: string;
}

export const FUEL_INSTRUMENTS = ['jetFuel', 'brentCrude', 'wtiCrude'] as const;
export const CURRENCY_INSTRUMENTS = ['usdInr', 'eurInr', 'gbpInr', 'jpyInr'] as const;

export type FuelInstrument = (typeof FUEL_INSTRUMENTS)[number];
export type CurrencyInstrument = (typeof CURRENCY_INSTRUMENTS)[number];
export type Instrument = FuelInstrument | CurrencyInstrument;

export type Domain = 'fuel' | 'currency';

// ═══════════════════════════════════════════════════════════════
// CHANGES & SIGNALS
// ═══════════════════════════════════════════════════════════════

/** Percentage change per instrument; missing key = not computable */
export type ChangeSet = Partial<Record<Instrument, number>>;

export type FuelSignalCode = 'HIGH_HEDGE' | 'MODERATE_HEDGE' | 'LOW_HEDGE' | 'MONITOR';
export type CurrencySignalCode = 'HIGH_VOLATILITY' | 'MODERATE_VOLATILITY' | 'STABLE';
export type SignalSeverity = 'CRITICAL' | 'WARNING' | 'OK' | 'INFO';

export interface HedgingSignal<C extends string> {
  code: C;
  severity: SignalSeverity;
  headline: string;
  description: string;
  /** The change the classification was keyed on, in percent */
  changePct: number;
}

// ═══════════════════════════════════════════════════════════════
// UPSTREAM PROVIDERS
// ═══════════════════════════════════════════════════════════════

/** Latest close for a quoted symbol (futures contract or currency pair) */
export interface QuoteProvider {
  readonly name: string;
  getLatestClose(symbol: string, signal?: AbortSignal): Promise<number>;
}

export interface RateTable {
  base: string;
  rates: Record<string, number>;
}

/** Rate table keyed by currency code, relative to a base currency */
export interface RateTableProvider {
  readonly name: string;
  getRateTable(base: string, signal?: AbortSignal): Promise<RateTable>;
}

// ═══════════════════════════════════════════════════════════════
// COLLECTION & LOADING
// ═══════════════════════════════════════════════════════════════

export type CycleSkipReason = 'LOCK_HELD' | 'TIMEOUT' | 'PERSISTENCE_FAILED';

export interface CollectionResult {
  ok: boolean;
  cycleId: string;
  message: string;
  startedAt: string;
  durationMs: number;
  fuel?: FuelObservation;
  currency?: CurrencyObservation;
  skipReason?: CycleSkipReason;
  error?: string;
}

export type SeriesLoadResult =
  | { status: 'OK'; fuel: FuelObservation[]; currency: CurrencyObservation[] }
  | { status: 'EMPTY'; fuel: []; currency: [] }
  | { status: 'UNAVAILABLE'; error: string };

// ═══════════════════════════════════════════════════════════════
// INJECTED RUNTIME
// ═══════════════════════════════════════════════════════════════

export interface Clock {
  now: () => Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export type RandomSource = () => number;
