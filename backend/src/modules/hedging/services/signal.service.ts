/**
 * SIGNAL CLASSIFIER — fixed-threshold hedging recommendations
 *
 * Stateless. Bands are checked in order and the first match wins.
 */

import {
  CURRENCY_SIGNAL_THRESHOLDS,
  FUEL_SIGNAL_THRESHOLDS,
} from '../config/hedging.defaults.js';
import type {
  ChangeSet,
  CurrencySignalCode,
  FuelSignalCode,
  HedgingSignal,
  SignalSeverity,
} from '../contracts/hedging.types.js';
import { changeOrZero } from './change.service.js';

export function classifyFuelSignal(jetFuelChangePct: number): FuelSignalCode {
  const c = jetFuelChangePct;
  if (c > FUEL_SIGNAL_THRESHOLDS.high) return 'HIGH_HEDGE';
  if (c > FUEL_SIGNAL_THRESHOLDS.moderate) return 'MODERATE_HEDGE';
  if (c < FUEL_SIGNAL_THRESHOLDS.low) return 'LOW_HEDGE';
  return 'MONITOR';
}

export function classifyCurrencySignal(usdInrChangePct: number): CurrencySignalCode {
  const magnitude = Math.abs(usdInrChangePct);
  if (magnitude > CURRENCY_SIGNAL_THRESHOLDS.high) return 'HIGH_VOLATILITY';
  if (magnitude > CURRENCY_SIGNAL_THRESHOLDS.moderate) return 'MODERATE_VOLATILITY';
  return 'STABLE';
}

const FUEL_SIGNAL_TEXT: Record<FuelSignalCode, { severity: SignalSeverity; headline: string; description: string }> = {
  HIGH_HEDGE: {
    severity: 'CRITICAL',
    headline: 'HIGH HEDGE RECOMMENDED',
    description: 'Jet fuel prices rising rapidly',
  },
  MODERATE_HEDGE: {
    severity: 'WARNING',
    headline: 'MODERATE HEDGE',
    description: 'Jet fuel prices trending up',
  },
  LOW_HEDGE: {
    severity: 'OK',
    headline: 'LOW HEDGE',
    description: 'Jet fuel prices declining',
  },
  MONITOR: {
    severity: 'INFO',
    headline: 'MONITOR',
    description: 'Jet fuel prices stable',
  },
};

const CURRENCY_SIGNAL_TEXT: Record<CurrencySignalCode, { severity: SignalSeverity; headline: string; description: string }> = {
  HIGH_VOLATILITY: {
    severity: 'CRITICAL',
    headline: 'HIGH VOLATILITY',
    description: 'USD/INR moving significantly',
  },
  MODERATE_VOLATILITY: {
    severity: 'WARNING',
    headline: 'MODERATE VOLATILITY',
    description: 'USD/INR showing movement',
  },
  STABLE: {
    severity: 'OK',
    headline: 'STABLE',
    description: 'USD/INR relatively stable',
  },
};

export function buildFuelSignal(changes: ChangeSet): HedgingSignal<FuelSignalCode> {
  const changePct = changeOrZero(changes, 'jetFuel');
  const code = classifyFuelSignal(changePct);
  return { code, ...FUEL_SIGNAL_TEXT[code], changePct };
}

export function buildCurrencySignal(changes: ChangeSet): HedgingSignal<CurrencySignalCode> {
  const changePct = changeOrZero(changes, 'usdInr');
  const code = classifyCurrencySignal(changePct);
  return { code, ...CURRENCY_SIGNAL_TEXT[code], changePct };
}
