/**
 * Human-readable report of a collection cycle (standalone collector output)
 */

import { errorMessage } from '../../../common/errors.js';
import type { CollectionResult } from '../contracts/hedging.types.js';

const RULE = '='.repeat(60);

/** Result for a cycle that could not start because the store was unreachable */
export function storeFailureResult(cycleId: string, startedAt: Date, cause: unknown): CollectionResult {
  const error = `Persistence failed: ${errorMessage(cause)}`;
  return {
    ok: false,
    cycleId,
    message: error,
    startedAt: startedAt.toISOString(),
    durationMs: Date.now() - startedAt.getTime(),
    skipReason: 'PERSISTENCE_FAILED',
    error,
  };
}

export function formatCycleSummary(result: CollectionResult): string {
  if (!result.ok || !result.fuel || !result.currency) {
    return [
      '',
      'ERROR: Real-time data collection failed',
      `  Reason: ${result.skipReason ?? 'UNKNOWN'}`,
      `  Detail: ${result.message}`,
    ].join('\n');
  }

  const { fuel, currency } = result;
  return [
    '',
    RULE,
    'REAL-TIME DATA COLLECTION COMPLETED',
    RULE,
    `Cycle: ${result.cycleId}`,
    `Timestamp: ${result.startedAt}`,
    '',
    `Fuel Prices (${fuel.source}, ${fuel.provider}):`,
    `  Jet Fuel: $${fuel.jetFuel.toFixed(3)}`,
    `  Brent Crude: $${fuel.brentCrude.toFixed(2)}`,
    `  WTI Crude: $${fuel.wtiCrude.toFixed(2)}`,
    '',
    `Currency Rates (${currency.source}, ${currency.provider}):`,
    `  USD/INR: ₹${currency.usdInr.toFixed(2)}`,
    `  EUR/INR: ₹${currency.eurInr.toFixed(2)}`,
    `  GBP/INR: ₹${currency.gbpInr.toFixed(2)}`,
    `  JPY/INR: ₹${currency.jpyInr.toFixed(6)}`,
    RULE,
    `SUCCESS: ${result.message}`,
  ].join('\n');
}
