/**
 * MONGO OBSERVATION STORE
 */

import { StoreUnavailableError } from '../../../common/errors.js';
import { isMongoConnected } from '../../../db/mongoose.js';
import type { CurrencyObservation, FuelObservation } from '../contracts/hedging.types.js';
import {
  CurrencyRateModel,
  FuelPriceModel,
  type ICurrencyRate,
  type IFuelPrice,
} from './hedging.models.js';
import { assertChronological, type ObservationStore } from './observation.store.js';

export function toFuelDoc(o: FuelObservation, cycleId: string): IFuelPrice {
  return {
    timestamp: o.timestamp,
    jet_fuel: o.jetFuel,
    brent_crude: o.brentCrude,
    wti_crude: o.wtiCrude,
    source: o.source,
    provider: o.provider,
    cycle_id: cycleId,
  };
}

export function fromFuelDoc(d: IFuelPrice): FuelObservation {
  return {
    timestamp: new Date(d.timestamp),
    jetFuel: d.jet_fuel,
    brentCrude: d.brent_crude,
    wtiCrude: d.wti_crude,
    source: d.source,
    provider: d.provider,
  };
}

export function toCurrencyDoc(o: CurrencyObservation, cycleId: string): ICurrencyRate {
  return {
    timestamp: o.timestamp,
    usd_inr: o.usdInr,
    eur_inr: o.eurInr,
    gbp_inr: o.gbpInr,
    jpy_inr: o.jpyInr,
    source: o.source,
    provider: o.provider,
    cycle_id: cycleId,
  };
}

export function fromCurrencyDoc(d: ICurrencyRate): CurrencyObservation {
  return {
    timestamp: new Date(d.timestamp),
    usdInr: d.usd_inr,
    eurInr: d.eur_inr,
    gbpInr: d.gbp_inr,
    jpyInr: d.jpy_inr,
    source: d.source,
    provider: d.provider,
  };
}

export class MongoObservationStore implements ObservationStore {
  readonly name = 'mongo';

  async appendFuel(observation: FuelObservation, cycleId: string): Promise<void> {
    this.ensureConnected();
    const latest = await FuelPriceModel.findOne().sort({ timestamp: -1 }).select({ timestamp: 1 }).lean();
    assertChronological('fuel_prices', latest?.timestamp, observation.timestamp);
    await FuelPriceModel.create(toFuelDoc(observation, cycleId));
  }

  async appendCurrency(observation: CurrencyObservation, cycleId: string): Promise<void> {
    this.ensureConnected();
    const latest = await CurrencyRateModel.findOne().sort({ timestamp: -1 }).select({ timestamp: 1 }).lean();
    assertChronological('currency_rates', latest?.timestamp, observation.timestamp);
    await CurrencyRateModel.create(toCurrencyDoc(observation, cycleId));
  }

  async recentFuel(limit: number): Promise<FuelObservation[]> {
    this.ensureConnected();
    const docs = await FuelPriceModel.find().sort({ timestamp: -1, _id: -1 }).limit(limit).lean();
    return docs.map(fromFuelDoc);
  }

  async recentCurrency(limit: number): Promise<CurrencyObservation[]> {
    this.ensureConnected();
    const docs = await CurrencyRateModel.find().sort({ timestamp: -1, _id: -1 }).limit(limit).lean();
    return docs.map(fromCurrencyDoc);
  }

  async discardCycle(cycleId: string): Promise<number> {
    this.ensureConnected();
    const fuel = await FuelPriceModel.deleteMany({ cycle_id: cycleId });
    const currency = await CurrencyRateModel.deleteMany({ cycle_id: cycleId });
    return fuel.deletedCount + currency.deletedCount;
  }

  private ensureConnected(): void {
    if (!isMongoConnected()) {
      throw new StoreUnavailableError();
    }
  }
}
