import type { RawReading, ReadingValues, Trend } from "./types.js";
import { parseInstant } from "./util.js";

/**
 * Changes smaller than this (in the unit of the compared field) are `stable`.
 */
export const TREND_THRESHOLD = 0.01;

export interface NormalizedReadings {
  // null when there were no readings at all
  latest: RawReading | null;
  trend: Trend;
  ordered: RawReading[];
}

/**
 * Sort readings chronologically and derive the latest reading and trend.
 * The sort is stable: readings with equal timestamps keep their input order.
 */
export function normalize(readings: readonly RawReading[]): NormalizedReadings {
  const ordered = readings
    .map((reading, index) => ({
      reading,
      index,
      time: parseInstant(reading.timestamp) ?? Number.NEGATIVE_INFINITY,
    }))
    .sort((a, b) => a.time - b.time || a.index - b.index)
    .map(({ reading }) => reading);

  return {
    latest: ordered.at(-1) ?? null,
    trend: computeTrend(ordered),
    ordered,
  };
}

/**
 * Trend of the two most recent readings of a chronologically ordered series.
 * Compares `level`, or `discharge` when either reading has no level.
 */
export function computeTrend(ordered: readonly RawReading[]): Trend {
  const newest = ordered.at(-1);
  const previous = ordered.at(-2);
  if (!newest || !previous) return "stable";

  const field: keyof ReadingValues =
    newest.level !== null && previous.level !== null ? "level" : "discharge";
  const current = newest[field];
  const before = previous[field];
  if (current === null || before === null) return "stable";

  const diff = current - before;
  if (Math.abs(diff) < TREND_THRESHOLD) return "stable";
  return diff > 0 ? "rising" : "falling";
}

/**
 * Key an ordered series by timestamp. A repeated timestamp keeps its first
 * position and takes the later values.
 */
export function toHourlyReadings(
  ordered: readonly RawReading[],
): Record<string, ReadingValues> {
  const hourly: Record<string, ReadingValues> = {};
  for (const { timestamp, level, discharge } of ordered) {
    hourly[timestamp] = { level, discharge };
  }
  return hourly;
}

export function fromHourlyReadings(
  hourly: Record<string, ReadingValues>,
): RawReading[] {
  return Object.entries(hourly).map(([timestamp, { level, discharge }]) => ({
    timestamp,
    level,
    discharge,
  }));
}
