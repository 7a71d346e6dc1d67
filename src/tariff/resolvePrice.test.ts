import { describe, it, expect } from "vitest";
import { configuredPrice, resolvePrice } from "./resolvePrice";
import type { PriceConfig } from "./types";

const createPriceConfig = (
  overrides: Partial<PriceConfig> = {}
): PriceConfig => ({
  usePrices: true,
  priceHigh: 5.0,
  priceLow: 3.5,
  vatPercentage: 21.0,
  ...overrides,
});

describe("configuredPrice", () => {
  it("should pick the low price for LOW", () => {
    expect(configuredPrice(createPriceConfig(), "LOW")).toEqual({
      pricePerKwh: 3.5,
      vatPercentage: 21.0,
    });
  });

  it("should pick the high price for HIGH", () => {
    expect(configuredPrice(createPriceConfig(), "HIGH")).toEqual({
      pricePerKwh: 5.0,
      vatPercentage: 21.0,
    });
  });

  it("should assume HIGH when the rate type is unknown", () => {
    expect(configuredPrice(createPriceConfig(), undefined)).toEqual({
      pricePerKwh: 5.0,
      vatPercentage: 21.0,
    });
  });

  it("should return nothing when prices are disabled", () => {
    expect(
      configuredPrice(createPriceConfig({ usePrices: false }), "LOW")
    ).toEqual({});
  });

  it("should treat a zero price as not configured", () => {
    const config = createPriceConfig({ priceLow: 0 });

    expect(configuredPrice(config, "LOW")).toEqual({});
    expect(configuredPrice(config, "HIGH")).toEqual({
      pricePerKwh: 5.0,
      vatPercentage: 21.0,
    });
  });
});

describe("resolvePrice", () => {
  it("should auto detect both from the rate type", () => {
    expect(resolvePrice({}, createPriceConfig(), "LOW")).toEqual({
      pricePerKwh: 3.5,
      vatPercentage: 21.0,
    });
  });

  it("should fall back to the high price without a rate type", () => {
    expect(resolvePrice({}, createPriceConfig(), undefined)).toEqual({
      pricePerKwh: 5.0,
      vatPercentage: 21.0,
    });
  });

  it("should return nothing when prices are disabled", () => {
    expect(
      resolvePrice({}, createPriceConfig({ usePrices: false }), "HIGH")
    ).toEqual({ pricePerKwh: undefined, vatPercentage: undefined });
  });

  it("should return nothing for a zero configured price", () => {
    expect(
      resolvePrice({}, createPriceConfig({ priceHigh: 0 }), "HIGH")
    ).toEqual({ pricePerKwh: undefined, vatPercentage: undefined });
  });

  it("should keep explicit price and VAT", () => {
    expect(
      resolvePrice(
        { pricePerKwh: 7.25, vatPercentage: 15 },
        createPriceConfig(),
        "LOW"
      )
    ).toEqual({ pricePerKwh: 7.25, vatPercentage: 15 });
  });

  it("should keep an explicit price and only default the VAT", () => {
    expect(
      resolvePrice({ pricePerKwh: 7.25 }, createPriceConfig(), "LOW")
    ).toEqual({ pricePerKwh: 7.25, vatPercentage: 21.0 });
  });

  it("should keep an explicit VAT and only default the price", () => {
    expect(
      resolvePrice({ vatPercentage: 10 }, createPriceConfig(), "LOW")
    ).toEqual({ pricePerKwh: 3.5, vatPercentage: 10 });
  });

  it("should keep an explicit zero price", () => {
    expect(
      resolvePrice({ pricePerKwh: 0 }, createPriceConfig(), "HIGH")
    ).toEqual({ pricePerKwh: 0, vatPercentage: 21.0 });
  });

  it("should not attach the configured VAT when prices are disabled", () => {
    expect(
      resolvePrice(
        { pricePerKwh: 7.25 },
        createPriceConfig({ usePrices: false }),
        "LOW"
      )
    ).toEqual({ pricePerKwh: 7.25, vatPercentage: undefined });
  });

  it("should keep an explicit VAT even without a price", () => {
    expect(
      resolvePrice(
        { vatPercentage: 10 },
        createPriceConfig({ usePrices: false }),
        "LOW"
      )
    ).toEqual({ pricePerKwh: undefined, vatPercentage: 10 });
  });
});
