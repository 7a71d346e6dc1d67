import DEBUG from "debug";
import { classifyTariffState } from "./classifyTariffState";
import { isLowTariff } from "./isLowTariff";
import type { RateType, StateLookup, TariffSource } from "./types";

const debug = DEBUG("ev-tracker.tariff.rate-type");

export type RateTypeRequest = {
  rateType?: RateType;
};

/**
 * The rate type to attach to a charging session.
 *
 * An explicit rate type always wins. Otherwise it is detected from the tariff source:
 * schedules are evaluated for `now`, entities are read through `lookup`.
 * Returns undefined when nothing can be detected, the session is then logged without one.
 */
export function resolveRateType(
  request: RateTypeRequest,
  source: TariffSource,
  lookup: StateLookup,
  now: Date = new Date()
): RateType | undefined {
  if (request.rateType) {
    return request.rateType;
  }

  switch (source.type) {
    case "none":
      return undefined;
    case "schedule":
      return isLowTariff(source.schedule, now) ? "LOW" : "HIGH";
    case "entity": {
      if (!source.entityId) {
        return undefined;
      }

      const state = lookup(source.entityId);
      if (typeof state === "undefined") {
        debug("tariff entity %s not found", source.entityId);
        return undefined;
      }

      return classifyTariffState(state);
    }
  }
}
