import ms from "ms";
import { z } from "zod";
import type { PriceConfig, TariffSource, TariffWindow } from "../tariff/types";

export const MAX_TARIFF_WINDOWS = 4;

export const DEFAULT_UPDATE_INTERVAL_SECONDS = 300;

/**
 * Seconds between two polls of the statistics.
 */
export const updateIntervalSchema = z.number().int().min(60).max(3600);

const windowSchema = z.object({
  start: z.string().optional(),
  end: z.string().optional(),
});

const tariffSchema = z
  .object({
    source: z.enum(["none", "schedule", "entity"]).default("none"),
    entity: z.string().min(1).optional(),
    windowType: z.enum(["low", "high"]).default("low"),
    windows: z.array(windowSchema).max(MAX_TARIFF_WINDOWS).default([]),
    weekendAlwaysLow: z.boolean().default(false),
  })
  .superRefine((tariff, ctx) => {
    tariff.windows.forEach((window, index) => {
      if (!!window.start !== !!window.end) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["windows", index],
          message: `window ${index + 1} needs both a start and an end`,
        });
      }
    });

    if (tariff.source === "schedule") {
      const first = tariff.windows[0];
      if (!first?.start || !first?.end) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["windows", 0],
          message: "a schedule needs at least the first window",
        });
      }
    }

    if (tariff.source === "entity" && !tariff.entity) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["entity"],
        message: "an entity tariff source needs an entity",
      });
    }
  });

const pricesSchema = z.object({
  usePrices: z.boolean().default(false),
  priceHigh: z.number().min(0).default(0),
  priceLow: z.number().min(0).default(0),
  vatPercentage: z.number().min(0).default(21),
});

export const installationSchema = z.object({
  carId: z.coerce.number().int(),
  carName: z.string().optional(),
  apiKey: z.string().min(1).optional(),
  updateInterval: updateIntervalSchema.optional(),
  tariff: tariffSchema.default({}),
  prices: pricesSchema.default({}),
});

export const installationsSchema = z.array(installationSchema);

type InstallationConfig = z.output<typeof installationSchema>;

/**
 * Everything configured for one car. Replaced as a whole when the configuration changes.
 */
export type Installation = {
  carId: number;
  carName: string;
  apiKey: string;
  /**
   * In milliseconds.
   */
  updateInterval: number;
  tariffSource: TariffSource;
  prices: PriceConfig;
};

export type InstallationDefaults = {
  apiKey: string;
  /**
   * In seconds.
   */
  updateInterval: number;
};

function toTariffSource(tariff: InstallationConfig["tariff"]): TariffSource {
  switch (tariff.source) {
    case "none":
      return { type: "none" };
    case "entity":
      return { type: "entity", entityId: tariff.entity };
    case "schedule": {
      const windows = tariff.windows.flatMap((window): TariffWindow[] =>
        window.start && window.end
          ? [{ start: window.start, end: window.end }]
          : []
      );

      return {
        type: "schedule",
        schedule: {
          windows,
          windowType: tariff.windowType,
          weekendAlwaysLow: tariff.weekendAlwaysLow,
        },
      };
    }
  }
}

export function toInstallation(
  config: InstallationConfig,
  defaults: InstallationDefaults
): Installation {
  const apiKey = config.apiKey ?? defaults.apiKey;
  if (!apiKey) {
    throw new Error(`car ${config.carId} has no API key configured`);
  }

  return {
    carId: config.carId,
    carName: config.carName ?? `Car ${config.carId}`,
    apiKey,
    updateInterval: ms(
      `${config.updateInterval ?? defaults.updateInterval}s`
    ),
    tariffSource: toTariffSource(config.tariff),
    prices: config.prices,
  };
}

/**
 * Validates the configured cars. Throws a ZodError for invalid ones.
 */
export function parseInstallations(
  value: unknown,
  defaults: InstallationDefaults
): Installation[] {
  const installations = installationsSchema
    .parse(value)
    .map((config) => toInstallation(config, defaults));

  const carIds = installations.map((installation) => installation.carId);
  const duplicate = carIds.find((id, index) => carIds.indexOf(id) !== index);
  if (typeof duplicate !== "undefined") {
    throw new Error(`car ${duplicate} is configured more than once`);
  }

  return installations;
}
