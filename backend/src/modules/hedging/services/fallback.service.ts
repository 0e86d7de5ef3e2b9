/**
 * FALLBACK GENERATOR — synthetic observations when every live source failed
 *
 * Each field is drawn independently from its closed interval and rounded the
 * same way live values are. Never throws.
 */

import {
  CURRENCY_FALLBACK_BOUNDS,
  DECIMALS,
  FUEL_FALLBACK_BOUNDS,
} from '../config/hedging.defaults.js';
import {
  systemClock,
  type Clock,
  type CurrencyObservation,
  type FuelObservation,
  type RandomSource,
} from '../contracts/hedging.types.js';
import { roundTo, uniform } from '../utils/numbers.js';

export const FALLBACK_PROVIDER = 'fallback';

function draw(bounds: readonly [number, number], decimals: number, random: RandomSource): number {
  const [min, max] = bounds;
  return roundTo(uniform(min, max, random), decimals);
}

export function generateFallbackFuel(
  clock: Clock = systemClock,
  random: RandomSource = Math.random,
): FuelObservation {
  return {
    timestamp: clock.now(),
    jetFuel: draw(FUEL_FALLBACK_BOUNDS.jetFuel, DECIMALS.jetFuel, random),
    brentCrude: draw(FUEL_FALLBACK_BOUNDS.brentCrude, DECIMALS.brentCrude, random),
    wtiCrude: draw(FUEL_FALLBACK_BOUNDS.wtiCrude, DECIMALS.wtiCrude, random),
    source: 'FALLBACK',
    provider: FALLBACK_PROVIDER,
  };
}

export function generateFallbackCurrency(
  clock: Clock = systemClock,
  random: RandomSource = Math.random,
): CurrencyObservation {
  return {
    timestamp: clock.now(),
    usdInr: draw(CURRENCY_FALLBACK_BOUNDS.usdInr, DECIMALS.usdInr, random),
    eurInr: draw(CURRENCY_FALLBACK_BOUNDS.eurInr, DECIMALS.eurInr, random),
    gbpInr: draw(CURRENCY_FALLBACK_BOUNDS.gbpInr, DECIMALS.gbpInr, random),
    jpyInr: draw(CURRENCY_FALLBACK_BOUNDS.jpyInr, DECIMALS.jpyInr, random),
    source: 'FALLBACK',
    provider: FALLBACK_PROVIDER,
  };
}
