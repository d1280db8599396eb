import { BatchCommitter } from "./batch.js";
import { stationKey } from "./catalog/key.js";
import { toMergeOperations } from "./daily.js";
import { BatchCommitError, FetchError, ReadError, WriteError, describeError } from "./errors.js";
import type { DailyMeanRegistry } from "./providers/index.js";
import { DEFAULT_HISTORY_DAYS } from "./providers/environment-canada.js";
import { buildReport, summarize, systemClock, type Clock, type Logger } from "./report.js";
import type { HistoricalStore, MetadataStore } from "./store/types.js";
import type { RunReport, Station, StationMetadata, StationOutcome } from "./types.js";
import { formatInstant } from "./util.js";

export interface BackfillOptions {
  sources: DailyMeanRegistry;
  store: HistoricalStore & MetadataStore;
  // Days of official daily means to request per station
  days?: number;
  // Backfill stations that already have metadata too
  force?: boolean;
  // Fetch without writing
  dryRun?: boolean;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Seeds the yearly history of new stations with the provider's official daily
 * means. A station is new until it has a metadata record, which is written
 * only once its means are committed.
 */
export class HistoryBackfiller {
  private readonly options: BackfillOptions;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: BackfillOptions) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? console;
  }

  async run(stations: readonly Station[]): Promise<RunReport> {
    const startedAt = this.clock();
    const committer = new BatchCommitter(this.options.store);
    const outcomes: StationOutcome[] = [];

    // One station at a time, each committed before its metadata is written
    for (const station of stations) {
      outcomes.push(await this.backfill(station, committer, startedAt));
    }

    const report = buildReport(
      "backfill",
      startedAt,
      this.clock(),
      outcomes,
      committer.summary(),
    );
    this.logger.info(summarize(report));
    return report;
  }

  private async backfill(
    station: Station,
    committer: BatchCommitter,
    now: Date,
  ): Promise<StationOutcome> {
    const { sources, store, days = DEFAULT_HISTORY_DAYS, force = false, dryRun = false } =
      this.options;
    const key = stationKey(station);
    const updatedAt = formatInstant(now.getTime());

    let existing: StationMetadata | null;
    try {
      existing = await store.getMetadata(key);
    } catch (cause) {
      const error = new ReadError(key, `Unable to read metadata for ${key}`, { cause });
      this.logger.warn(`[backfill] ${key}: ${error.message}`);
      return { station: key, status: "failed", error: describeError(error) };
    }

    if (existing && !force) {
      this.logger.info(`[backfill] ${key}: skipped, history already fetched`);
      return { station: key, status: "skipped", reason: "has_history" };
    }

    try {
      const source = sources.get(station.provider);
      if (!source) {
        throw new FetchError(`No daily mean source for ${station.provider}`, {
          retryable: false,
        });
      }

      const { station_name, means } = await source.fetchDailyMeans(station, { days, now });
      if (means.length === 0) {
        this.logger.warn(`[backfill] ${key}: no daily means, skipped`);
        return { station: key, status: "skipped", reason: "no_history" };
      }

      const operations = toMergeOperations(key, means, updatedAt);
      const years = operations.map((op) => op.year);

      if (!dryRun) {
        for (const operation of operations) {
          await committer.enqueue(operation);
        }
        await committer.finalize();

        const metadata: StationMetadata = {
          provider: station.provider,
          station_code: station.code,
          station_name:
            station_name ?? station.name ?? existing?.station_name ?? `Station ${station.code}`,
          first_data_fetch: existing?.first_data_fetch ?? updatedAt,
          last_updated: updatedAt,
          river_runs: station.runs ?? existing?.river_runs ?? [],
        };
        try {
          await store.putMetadata(key, metadata);
        } catch (cause) {
          const reason = cause instanceof Error ? cause.message : String(cause);
          throw new WriteError(key, `Unable to write metadata for ${key}: ${reason}`, { cause });
        }
      }

      this.logger.info(
        `[backfill] ${key}: ${means.length} daily means (${years.join(", ")})${
          dryRun ? " (dry run)" : ""
        }`,
      );
      return {
        station: key,
        status: "success",
        readings: means.length,
        dates: means.length,
        years,
      };
    } catch (error) {
      if (error instanceof BatchCommitError) {
        this.logger.error(`[backfill] ${error.message}`);
      } else {
        this.logger.error(`[backfill] ${key}: ${describeError(error).message}`);
      }
      return { station: key, status: "failed", error: describeError(error) };
    }
  }
}

export function runBackfill(
  stations: readonly Station[],
  options: BackfillOptions,
): Promise<RunReport> {
  return new HistoryBackfiller(options).run(stations);
}
