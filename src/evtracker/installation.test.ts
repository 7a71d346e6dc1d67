import { describe, it, expect } from "vitest";
import { parseInstallations } from "./installation";

const defaults = { apiKey: "test-api-key", updateInterval: 300 };

describe("parseInstallations", () => {
  it("should apply defaults to a minimal car", () => {
    expect(parseInstallations([{ carId: 7 }], defaults)).toEqual([
      {
        carId: 7,
        carName: "Car 7",
        apiKey: "test-api-key",
        updateInterval: 300000,
        tariffSource: { type: "none" },
        prices: {
          usePrices: false,
          priceHigh: 0,
          priceLow: 0,
          vatPercentage: 21,
        },
      },
    ]);
  });

  it("should build a schedule and drop empty windows", () => {
    const [installation] = parseInstallations(
      [
        {
          carId: "3",
          carName: "Model 3",
          apiKey: "other-test-key",
          updateInterval: 60,
          tariff: {
            source: "schedule",
            windowType: "high",
            windows: [
              { start: "07:00", end: "21:00" },
              {},
              { start: "", end: "" },
            ],
            weekendAlwaysLow: true,
          },
          prices: { usePrices: true, priceHigh: 5, priceLow: 3.5 },
        },
      ],
      defaults
    );

    expect(installation).toEqual({
      carId: 3,
      carName: "Model 3",
      apiKey: "other-test-key",
      updateInterval: 60000,
      tariffSource: {
        type: "schedule",
        schedule: {
          windows: [{ start: "07:00", end: "21:00" }],
          windowType: "high",
          weekendAlwaysLow: true,
        },
      },
      prices: { usePrices: true, priceHigh: 5, priceLow: 3.5, vatPercentage: 21 },
    });
  });

  it("should build an entity source", () => {
    const [installation] = parseInstallations(
      [
        {
          carId: 1,
          tariff: { source: "entity", entity: "binary_sensor.night_rate" },
        },
      ],
      defaults
    );

    expect(installation.tariffSource).toEqual({
      type: "entity",
      entityId: "binary_sensor.night_rate",
    });
  });

  it("should reject a partial window", () => {
    expect(() =>
      parseInstallations(
        [
          {
            carId: 1,
            tariff: {
              source: "schedule",
              windows: [{ start: "22:00", end: "06:00" }, { start: "12:00" }],
            },
          },
        ],
        defaults
      )
    ).toThrow("window 2 needs both a start and an end");
  });

  it("should require the first window for a schedule", () => {
    expect(() =>
      parseInstallations(
        [{ carId: 1, tariff: { source: "schedule", windows: [] } }],
        defaults
      )
    ).toThrow("a schedule needs at least the first window");
  });

  it("should reject more than four windows", () => {
    const window = { start: "01:00", end: "02:00" };

    expect(() =>
      parseInstallations(
        [
          {
            carId: 1,
            tariff: {
              source: "schedule",
              windows: [window, window, window, window, window],
            },
          },
        ],
        defaults
      )
    ).toThrow();
  });

  it("should require an entity for an entity source", () => {
    expect(() =>
      parseInstallations(
        [{ carId: 1, tariff: { source: "entity" } }],
        defaults
      )
    ).toThrow("an entity tariff source needs an entity");
  });

  it("should reject negative prices", () => {
    expect(() =>
      parseInstallations(
        [{ carId: 1, prices: { usePrices: true, priceHigh: -1 } }],
        defaults
      )
    ).toThrow();
  });

  it("should reject an update interval outside of 60 to 3600 seconds", () => {
    expect(() =>
      parseInstallations([{ carId: 1, updateInterval: 30 }], defaults)
    ).toThrow();
  });

  it("should require an API key", () => {
    expect(() =>
      parseInstallations([{ carId: 1 }], { ...defaults, apiKey: "" })
    ).toThrow("car 1 has no API key configured");
  });

  it("should reject the same car twice", () => {
    expect(() =>
      parseInstallations([{ carId: 1 }, { carId: 1 }], defaults)
    ).toThrow("car 1 is configured more than once");
  });
});
