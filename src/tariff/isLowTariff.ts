import { isWeekend } from "date-fns";
import inTimeRange from "../helpers/inTimeRange";
import type { TariffScheduleConfig } from "./types";

/**
 * Whether the low tariff applies at `now` for a schedule.
 *
 * Weekends short-circuit to low when `weekendAlwaysLow` is set. Otherwise `now` is matched against
 * every window and the window type decides whether a match means low or high.
 * A window with a malformed time only fails for itself.
 */
export function isLowTariff(config: TariffScheduleConfig, now: Date): boolean {
  if (config.weekendAlwaysLow && isWeekend(now)) {
    return true;
  }

  const inWindow = config.windows.some((window) =>
    inTimeRange(window.start, window.end)(now)
  );

  return config.windowType === "high" ? !inWindow : inWindow;
}
