import type { RateType } from "./types";

const LOW_STATES = ["on", "true", "1", "low", "yes"];

/**
 * Whether the state of a user provided tariff entity means the low tariff.
 * Works for binary sensors, input booleans and sensors reporting "low"/"high".
 */
export function isLowTariffState(state: string): boolean {
  return LOW_STATES.includes(state.toLowerCase());
}

export function classifyTariffState(state: string): RateType {
  return isLowTariffState(state) ? "LOW" : "HIGH";
}
