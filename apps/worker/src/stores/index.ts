import type { AlertStore } from "./alerts.js";
import type { MarketStore } from "./markets.js";
import type { PriceHistoryStore } from "./price-history.js";
import type { ResolutionStore } from "./resolutions.js";
import type { SignalStore } from "./signals.js";
import type { ThresholdRepository } from "./thresholds.js";
import type { Expirable } from "./types.js";

export interface Stores {
  markets: MarketStore;
  history: PriceHistoryStore;
  signals: SignalStore;
  thresholds: ThresholdRepository;
  resolutions: ResolutionStore;
  alerts: AlertStore;
}

export function expirableStores(stores: Stores): Expirable[] {
  return [
    stores.markets,
    stores.history,
    stores.signals,
    stores.thresholds,
    stores.resolutions,
    stores.alerts
  ];
}
