/**
 * HEDGING SERIES MODELS — MongoDB Storage
 *
 * One document per observation; documents are never updated.
 */

import mongoose, { Schema } from 'mongoose';

// ═══════════════════════════════════════════════════════════════
// FUEL PRICES
// ═══════════════════════════════════════════════════════════════

export interface IFuelPrice {
  timestamp: Date;
  jet_fuel: number;
  brent_crude: number;
  wti_crude: number;
  source: 'LIVE' | 'FALLBACK';
  provider: string;
  cycle_id: string;
}

const FuelPriceSchema = new Schema<IFuelPrice>({
  timestamp: { type: Date, required: true },
  jet_fuel: { type: Number, required: true, min: 0 },
  brent_crude: { type: Number, required: true, min: 0 },
  wti_crude: { type: Number, required: true, min: 0 },
  source: { type: String, enum: ['LIVE', 'FALLBACK'], required: true },
  provider: { type: String, required: true },
  cycle_id: { type: String, required: true, index: true },
}, {
  collection: 'fuel_prices',
  versionKey: false,
});

FuelPriceSchema.index({ timestamp: -1 });

export const FuelPriceModel = mongoose.model<IFuelPrice>('FuelPrice', FuelPriceSchema);

// ═══════════════════════════════════════════════════════════════
// CURRENCY RATES
// ═══════════════════════════════════════════════════════════════

export interface ICurrencyRate {
  timestamp: Date;
  usd_inr: number;
  eur_inr: number;
  gbp_inr: number;
  jpy_inr: number;
  source: 'LIVE' | 'FALLBACK';
  provider: string;
  cycle_id: string;
}

const CurrencyRateSchema = new Schema<ICurrencyRate>({
  timestamp: { type: Date, required: true },
  usd_inr: { type: Number, required: true, min: 0 },
  eur_inr: { type: Number, required: true, min: 0 },
  gbp_inr: { type: Number, required: true, min: 0 },
  jpy_inr: { type: Number, required: true, min: 0 },
  source: { type: String, enum: ['LIVE', 'FALLBACK'], required: true },
  provider: { type: String, required: true },
  cycle_id: { type: String, required: true, index: true },
}, {
  collection: 'currency_rates',
  versionKey: false,
});

CurrencyRateSchema.index({ timestamp: -1 });

export const CurrencyRateModel = mongoose.model<ICurrencyRate>('CurrencyRate', CurrencyRateSchema);
