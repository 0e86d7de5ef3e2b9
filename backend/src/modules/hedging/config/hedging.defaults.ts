/**
 * HEDGING DEFAULTS — fixed constants of the collector and signal rules
 */

// ═══════════════════════════════════════════════════════════════
// FUEL
// ═══════════════════════════════════════════════════════════════

/** Jet fuel proxy = mean(Brent, WTI) × multiplier. Not a market quote. */
export const JET_FUEL_MULTIPLIER = 1.35;

export const FUTURES_SYMBOLS = {
  brentCrude: 'BZ=F',
  wtiCrude: 'CL=F',
} as const;

// ═══════════════════════════════════════════════════════════════
// CURRENCY
// ═══════════════════════════════════════════════════════════════

export const RATE_TABLE_BASE = 'USD';

export const PAIR_SYMBOLS = {
  usdInr: 'USDINR=X',
  eurInr: 'EURINR=X',
  gbpInr: 'GBPINR=X',
  jpyInr: 'JPYINR=X',
} as const;

/** Substituted per pair when a direct quote fails and USD/INR did not */
export const PAIR_DEFAULTS = {
  eurInr: 90.0,
  gbpInr: 105.0,
  jpyInr: 0.55,
} as const;

// ═══════════════════════════════════════════════════════════════
// FALLBACK BOUNDS (closed intervals)
// ═══════════════════════════════════════════════════════════════

export const FUEL_FALLBACK_BOUNDS = {
  jetFuel: [2.3, 2.6],
  brentCrude: [60, 70],
  wtiCrude: [55, 65],
} as const;

export const CURRENCY_FALLBACK_BOUNDS = {
  usdInr: [88, 90],
  eurInr: [102, 105],
  gbpInr: [117, 120],
  jpyInr: [0.57, 0.58],
} as const;

// ═══════════════════════════════════════════════════════════════
// ROUNDING
// ═══════════════════════════════════════════════════════════════

export const DECIMALS = {
  jetFuel: 6,
  brentCrude: 2,
  wtiCrude: 2,
  usdInr: 2,
  eurInr: 2,
  gbpInr: 2,
  jpyInr: 6,
} as const;

// ═══════════════════════════════════════════════════════════════
// SIGNAL THRESHOLDS (percent)
// ═══════════════════════════════════════════════════════════════

export const FUEL_SIGNAL_THRESHOLDS = {
  high: 2,
  moderate: 0.5,
  low: -1,
} as const;

export const CURRENCY_SIGNAL_THRESHOLDS = {
  high: 1,
  moderate: 0.3,
} as const;

// ═══════════════════════════════════════════════════════════════
// TIMING
// ═══════════════════════════════════════════════════════════════

export const HTTP_TIMEOUT_MS = 10_000;
export const CYCLE_TIMEOUT_MS = 30_000;
export const SERIES_LIMIT = 100;
export const RECENT_ROWS = 10;

/** Data age bands for the dashboard freshness indicator */
export const FRESH_MAX_AGE_SEC = 300;
export const AGING_MAX_AGE_SEC = 3600;

export const DATA_SOURCES = {
  fuel: ['Yahoo Finance (BZ=F, CL=F)'],
  currency: ['ExchangeRate-API (USD table)', 'Yahoo Finance (INR pairs)'],
} as const;
