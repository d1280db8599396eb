import { BatchCommitter } from "./batch.js";
import { stationKey } from "./catalog/key.js";
import { BatchCommitError, ReadError, describeError } from "./errors.js";
import { fromHourlyReadings } from "./normalize.js";
import { buildReport, summarize, systemClock, type Clock, type Logger } from "./report.js";
import type { CurrentStateStore, HistoricalStore } from "./store/types.js";
import type {
  CurrentStation,
  DailyMean,
  DailyMergeOperation,
  DailyValues,
  RawReading,
  RunReport,
  Station,
  StationOutcome,
} from "./types.js";
import { formatInstant, groupBy, mean, utcDate } from "./util.js";

/**
 * Mean level and discharge per UTC calendar day, in date order. Each mean
 * covers only the non-null values of its field; a day without any is `null`.
 */
export function computeDailyMeans(readings: readonly RawReading[]): DailyMean[] {
  const dated = readings.flatMap((reading) => {
    const date = utcDate(reading.timestamp);
    return date ? [{ date, reading }] : [];
  });

  return Object.entries(groupBy(dated, ({ date }) => date))
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, group]) => {
      const levels = group.flatMap(({ reading }) =>
        reading.level === null ? [] : [reading.level],
      );
      const discharges = group.flatMap(({ reading }) =>
        reading.discharge === null ? [] : [reading.discharge],
      );

      return {
        date,
        mean_level: mean(levels),
        mean_discharge: mean(discharges),
        level_samples: levels.length,
        discharge_samples: discharges.length,
      };
    });
}

export function bucketByYear(
  means: readonly DailyMean[],
): Map<number, Record<string, DailyValues>> {
  const buckets = new Map<number, Record<string, DailyValues>>();
  for (const { date, ...values } of means) {
    const year = Number(date.slice(0, 4));
    const bucket = buckets.get(year) ?? {};
    bucket[date] = values;
    buckets.set(year, bucket);
  }
  return buckets;
}

export function toMergeOperations(
  station: string,
  means: readonly DailyMean[],
  updatedAt: string,
): DailyMergeOperation[] {
  return [...bucketByYear(means)].map(([year, daily_readings]) => ({
    station,
    year,
    daily_readings,
    updated_at: updatedAt,
  }));
}

export interface DailyAggregationOptions {
  store: CurrentStateStore & HistoricalStore;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Rolls each station's current hourly readings up into daily means and
 * merges them into the yearly history. Stations are processed one at a time
 * through a single `BatchCommitter`.
 */
export class DailyAggregator {
  private readonly store: CurrentStateStore & HistoricalStore;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor({ store, clock = systemClock, logger = console }: DailyAggregationOptions) {
    this.store = store;
    this.clock = clock;
    this.logger = logger;
  }

  async run(stations: readonly Station[]): Promise<RunReport> {
    const startedAt = this.clock();
    const updatedAt = formatInstant(startedAt.getTime());
    const committer = new BatchCommitter(this.store);
    const outcomes = new Map<string, StationOutcome>();

    const failBatch = (error: BatchCommitError) => {
      this.logger.error(`[daily] ${error.message}`);
      for (const station of error.stations) {
        outcomes.set(station, { station, status: "failed", error: describeError(error) });
      }
    };

    for (const station of stations) {
      const key = stationKey(station);

      let current: CurrentStation | null;
      try {
        current = await this.store.getCurrent(key);
      } catch (cause) {
        const error = new ReadError(key, `Unable to read current state for ${key}`, { cause });
        this.logger.warn(`[daily] ${key}: ${error.message}`);
        outcomes.set(key, { station: key, status: "failed", error: describeError(error) });
        continue;
      }

      if (!current) {
        this.logger.info(`[daily] ${key}: skipped, no current state`);
        outcomes.set(key, { station: key, status: "skipped", reason: "no_current_state" });
        continue;
      }

      const readings = fromHourlyReadings(current.hourly_readings);
      const means = computeDailyMeans(readings);
      if (means.length === 0) {
        this.logger.info(`[daily] ${key}: skipped, no readings`);
        outcomes.set(key, { station: key, status: "skipped", reason: "no_readings" });
        continue;
      }

      const operations = toMergeOperations(key, means, updatedAt);
      outcomes.set(key, {
        station: key,
        status: "success",
        readings: readings.length,
        dates: means.length,
        years: operations.map((op) => op.year),
      });
      this.logger.info(
        `[daily] ${key}: ${means.length} days from ${readings.length} readings (${operations
          .map((op) => op.year)
          .join(", ")})`,
      );

      try {
        for (const operation of operations) {
          await committer.enqueue(operation);
        }
      } catch (error) {
        if (!(error instanceof BatchCommitError)) throw error;
        failBatch(error);
      }
    }

    try {
      await committer.finalize();
    } catch (error) {
      if (!(error instanceof BatchCommitError)) throw error;
      failBatch(error);
    }

    const report = buildReport(
      "daily",
      startedAt,
      this.clock(),
      [...outcomes.values()],
      committer.summary(),
    );
    this.logger.info(summarize(report));
    return report;
  }
}

export function runDailyAggregation(
  stations: readonly Station[],
  options: DailyAggregationOptions,
): Promise<RunReport> {
  return new DailyAggregator(options).run(stations);
}
