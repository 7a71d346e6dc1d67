import { getHours, getMinutes, getSeconds } from "date-fns";

const TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Seconds since midnight for "HH:MM" or "HH:MM:SS".
 * Returns undefined for anything that is not a valid time of day.
 */
export function parseTimeString(input: string): number | undefined {
  const match = TIME_PATTERN.exec(input.trim());
  if (!match) {
    return undefined;
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] ? Number(match[3]) : 0;

  if (hours > 23 || minutes > 59 || seconds > 59) {
    return undefined;
  }

  return hours * 3600 + minutes * 60 + seconds;
}

// Each invalid range is reported once.
const reportedInvalid = new Set<string>();

function getTimestamp(date: Date): number {
  return getHours(date) * 3600 + getMinutes(date) * 60 + getSeconds(date);
}

/**
 * Both ends are inclusive. When the end lies before the start the range wraps past midnight.
 *
 * An unparsable start or end gives a range that never matches.
 */
export default function inTimeRange(start: string, end: string) {
  const starting = parseTimeString(start);
  const ending = parseTimeString(end);

  if (typeof starting === "undefined" || typeof ending === "undefined") {
    const range = `${start} - ${end}`;
    if (!reportedInvalid.has(range)) {
      reportedInvalid.add(range);
      console.error(`invalid time range ${range}, it will never match`);
    }
    return () => false;
  }

  return function (date: Date) {
    const timestamp = getTimestamp(date);

    if (starting <= ending) {
      return starting <= timestamp && timestamp <= ending;
    }

    return timestamp >= starting || timestamp <= ending;
  };
}
