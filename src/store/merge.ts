import type { DailyMergeOperation, DailyValues } from "../types.js";

/**
 * Sample count recorded for a provider's official daily mean: one per minute
 * of the day, more than any sub-daily series can contribute. Means computed
 * from current readings therefore never replace an official one.
 */
export const OFFICIAL_DAILY_SAMPLES = 1440;

/**
 * Merge stored and freshly aggregated values for one date. Each mean is
 * replaced only by one computed from at least as many readings.
 */
export function mergeDailyValues(
  existing: DailyValues | undefined,
  incoming: DailyValues,
): DailyValues {
  if (!existing) return { ...incoming };

  const level = existing.level_samples > incoming.level_samples ? existing : incoming;
  const discharge =
    existing.discharge_samples > incoming.discharge_samples ? existing : incoming;

  return {
    mean_level: level.mean_level,
    mean_discharge: discharge.mean_discharge,
    level_samples: level.level_samples,
    discharge_samples: discharge.discharge_samples,
  };
}

export function sameDailyValues(a: DailyValues | undefined, b: DailyValues): boolean {
  return (
    a !== undefined &&
    a.mean_level === b.mean_level &&
    a.mean_discharge === b.mean_discharge &&
    a.level_samples === b.level_samples &&
    a.discharge_samples === b.discharge_samples
  );
}

/**
 * Reject an operation whose dates fall outside its year.
 */
export function assertOperation(operation: DailyMergeOperation): void {
  const prefix = `${operation.year}-`;
  for (const date of Object.keys(operation.daily_readings)) {
    if (!date.startsWith(prefix)) {
      throw new Error(
        `Date ${date} does not belong to ${operation.station} year ${operation.year}`,
      );
    }
  }
}
