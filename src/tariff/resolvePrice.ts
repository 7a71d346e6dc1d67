import type { PriceConfig, RateType, ResolvedPrice } from "./types";

export type PriceRequest = {
  pricePerKwh?: number;
  vatPercentage?: number;
};

/**
 * The configured price for a rate type, HIGH when the rate type is unknown.
 * A price of zero counts as not configured.
 */
export function configuredPrice(
  config: PriceConfig,
  rateType: RateType | undefined
): ResolvedPrice {
  if (!config.usePrices) {
    return {};
  }

  const price = rateType === "LOW" ? config.priceLow : config.priceHigh;
  if (!(price > 0)) {
    return {};
  }

  return { pricePerKwh: price, vatPercentage: config.vatPercentage };
}

/**
 * Price and VAT are resolved independently: whatever the request carries is kept,
 * only the missing one falls back to configuration.
 * The configured VAT is only attached to a session that ends up with a price.
 */
export function resolvePrice(
  request: PriceRequest,
  config: PriceConfig,
  rateType: RateType | undefined
): ResolvedPrice {
  const pricePerKwh =
    request.pricePerKwh ?? configuredPrice(config, rateType).pricePerKwh;

  const vatPercentage =
    request.vatPercentage ??
    (config.usePrices && typeof pricePerKwh !== "undefined"
      ? config.vatPercentage
      : undefined);

  return { pricePerKwh, vatPercentage };
}
