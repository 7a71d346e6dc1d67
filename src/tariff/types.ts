export type RateType = "HIGH" | "LOW";

/**
 * What the configured windows mean.
 * LOW: inside a window is the low tariff. HIGH: inside a window is the high tariff.
 */
export type WindowType = "low" | "high";

export type TariffWindow = {
  start: string;
  end: string;
};

export type TariffScheduleConfig = {
  /**
   * Up to 4 windows. Times are "HH:MM" or "HH:MM:SS".
   */
  windows: TariffWindow[];
  windowType: WindowType;
  weekendAlwaysLow: boolean;
};

export type TariffSource =
  | { type: "none" }
  | { type: "schedule"; schedule: TariffScheduleConfig }
  | { type: "entity"; entityId?: string };

export type PriceConfig = {
  usePrices: boolean;
  /**
   * Per kWh, without VAT.
   */
  priceHigh: number;
  priceLow: number;
  vatPercentage: number;
};

/**
 * Returns the most recent state of an entity or undefined when we never saw it.
 */
export type StateLookup = (entityId: string) => string | undefined;

export type ResolvedPrice = {
  pricePerKwh?: number;
  vatPercentage?: number;
};
