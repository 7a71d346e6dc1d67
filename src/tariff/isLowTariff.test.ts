import { describe, it, expect } from "vitest";
import { isLowTariff } from "./isLowTariff";
import type { TariffScheduleConfig } from "./types";

// 2024-01-01 is a Monday, 2024-01-06 a Saturday and 2024-01-07 a Sunday.
const monday = (hours: number, minutes = 0) =>
  new Date(2024, 0, 1, hours, minutes);
const saturday = (hours: number, minutes = 0) =>
  new Date(2024, 0, 6, hours, minutes);
const sunday = (hours: number, minutes = 0) =>
  new Date(2024, 0, 7, hours, minutes);

const createSchedule = (
  overrides: Partial<TariffScheduleConfig> = {}
): TariffScheduleConfig => ({
  windows: [{ start: "22:00", end: "06:00" }],
  windowType: "low",
  weekendAlwaysLow: false,
  ...overrides,
});

describe("isLowTariff - low windows", () => {
  it("should be low inside an overnight window", () => {
    expect(isLowTariff(createSchedule(), monday(23))).toBe(true);
  });

  it("should be high outside an overnight window", () => {
    expect(isLowTariff(createSchedule(), monday(12))).toBe(false);
  });

  it("should be low early in the morning before the window ends", () => {
    expect(isLowTariff(createSchedule(), monday(5, 59))).toBe(true);
  });

  it("should include both boundaries", () => {
    expect(isLowTariff(createSchedule(), monday(22))).toBe(true);
    expect(isLowTariff(createSchedule(), monday(6))).toBe(true);
  });

  it("should match any of several windows", () => {
    const schedule = createSchedule({
      windows: [
        { start: "01:00", end: "03:00" },
        { start: "09:00", end: "10:00" },
        { start: "13:00", end: "14:30" },
        { start: "20:00", end: "21:00" },
      ],
    });

    expect(isLowTariff(schedule, monday(9, 30))).toBe(true);
    expect(isLowTariff(schedule, monday(14, 30))).toBe(true);
    expect(isLowTariff(schedule, monday(11))).toBe(false);
    expect(isLowTariff(schedule, monday(21, 1))).toBe(false);
  });

  it("should never be low without windows", () => {
    const schedule = createSchedule({ windows: [] });

    expect(isLowTariff(schedule, monday(0))).toBe(false);
    expect(isLowTariff(schedule, monday(12))).toBe(false);
    expect(isLowTariff(schedule, monday(23, 59))).toBe(false);
  });
});

describe("isLowTariff - high windows", () => {
  const schedule = createSchedule({
    windows: [{ start: "07:00", end: "21:00" }],
    windowType: "high",
  });

  it("should be high inside the window", () => {
    expect(isLowTariff(schedule, monday(12))).toBe(false);
  });

  it("should be low outside the window", () => {
    expect(isLowTariff(schedule, monday(23))).toBe(true);
  });

  it("should negate the low window result for the same instant", () => {
    const asLow = createSchedule({ ...schedule, windowType: "low" });

    for (const hours of [0, 6, 7, 12, 21, 22]) {
      expect(isLowTariff(schedule, monday(hours))).toBe(
        !isLowTariff(asLow, monday(hours))
      );
    }
  });

  it("should always be low without windows", () => {
    expect(isLowTariff({ ...schedule, windows: [] }, monday(12))).toBe(true);
  });
});

describe("isLowTariff - weekends", () => {
  it("should force low on saturday and sunday", () => {
    const schedule = createSchedule({ weekendAlwaysLow: true });

    expect(isLowTariff(schedule, saturday(12))).toBe(true);
    expect(isLowTariff(schedule, sunday(12))).toBe(true);
  });

  it("should force low on weekends regardless of the window type", () => {
    const schedule = createSchedule({
      windows: [{ start: "00:00", end: "23:59" }],
      windowType: "high",
      weekendAlwaysLow: true,
    });

    expect(isLowTariff(schedule, saturday(12))).toBe(true);
    expect(isLowTariff(schedule, monday(12))).toBe(false);
  });

  it("should use the windows on weekdays", () => {
    const schedule = createSchedule({ weekendAlwaysLow: true });

    expect(isLowTariff(schedule, monday(12))).toBe(false);
  });

  it("should use the windows on weekends when not forced", () => {
    expect(isLowTariff(createSchedule(), saturday(12))).toBe(false);
  });
});

describe("isLowTariff - malformed windows", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should skip a malformed window and keep evaluating the others", () => {
    const schedule = createSchedule({
      windows: [
        { start: "not-a-time", end: "06:00" },
        { start: "22:00", end: "06:00" },
      ],
    });

    expect(isLowTariff(schedule, monday(23))).toBe(true);
    expect(isLowTariff(schedule, monday(12))).toBe(false);
  });

  it("should treat a malformed window as not matching for high windows", () => {
    const schedule = createSchedule({
      windows: [{ start: "07:00", end: "99:99" }],
      windowType: "high",
    });

    expect(isLowTariff(schedule, monday(12))).toBe(true);
  });
});
