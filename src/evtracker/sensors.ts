import type { EntityAttributes } from "../types";
import type { TrackerState } from "./EvTrackerApi";

export const CURRENCY_CZK = "CZK";
export const UNIT_CZK_PER_KWH = "CZK/kWh";

export type StatisticSensorDescription = {
  key: string;
  name: string;
  unit?: string;
  deviceClass?: string;
  stateClass?: string;
  icon?: string;
  value: (state: TrackerState) => number | null | undefined;
  attributes?: (state: TrackerState) => EntityAttributes | undefined;
};

export const STATISTIC_SENSORS: StatisticSensorDescription[] = [
  {
    key: "monthly_energy",
    name: "Monthly Energy",
    unit: "kWh",
    deviceClass: "energy",
    stateClass: "total",
    value: (state) => state.currentMonth?.energyConsumedKwh,
  },
  {
    key: "monthly_cost",
    name: "Monthly Cost",
    unit: CURRENCY_CZK,
    deviceClass: "monetary",
    stateClass: "total",
    value: (state) => state.currentMonth?.totalCostWithVat,
  },
  {
    key: "monthly_sessions",
    name: "Monthly Sessions",
    stateClass: "total",
    icon: "mdi:counter",
    value: (state) => state.currentMonth?.sessionCount,
    attributes: (state) =>
      state.currentMonth
        ? { currency: state.currentMonth.currency ?? CURRENCY_CZK }
        : undefined,
  },
  {
    key: "yearly_energy",
    name: "Yearly Energy",
    unit: "kWh",
    deviceClass: "energy",
    stateClass: "total",
    value: (state) => state.currentYear?.energyConsumedKwh,
  },
  {
    key: "yearly_cost",
    name: "Yearly Cost",
    unit: CURRENCY_CZK,
    deviceClass: "monetary",
    stateClass: "total",
    value: (state) => state.currentYear?.totalCostWithVat,
  },
  {
    key: "last_session_energy",
    name: "Last Session Energy",
    unit: "kWh",
    deviceClass: "energy",
    icon: "mdi:ev-station",
    value: (state) => state.lastSession?.energyConsumedKwh,
    attributes: (state) => {
      const session = state.lastSession;
      if (!session) {
        return undefined;
      }

      return {
        car_name: session.carName ?? null,
        start_time: session.startTime ?? null,
        end_time: session.endTime ?? null,
        provider: session.provider ?? null,
        location: session.location ?? null,
      };
    },
  },
  {
    key: "last_session_cost",
    name: "Last Session Cost",
    unit: CURRENCY_CZK,
    deviceClass: "monetary",
    icon: "mdi:currency-usd",
    value: (state) => state.lastSession?.totalCostWithVat,
  },
  {
    key: "avg_cost_per_kwh",
    name: "Average Cost per kWh",
    unit: UNIT_CZK_PER_KWH,
    icon: "mdi:chart-line",
    value: (state) => state.currentMonth?.averageCostPerKwh,
  },
];
