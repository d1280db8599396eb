import { stationKey } from "./catalog/key.js";
import { FetchError, WriteError, describeError } from "./errors.js";
import { normalize, toHourlyReadings } from "./normalize.js";
import type { ProviderRegistry } from "./providers/index.js";
import { buildReport, summarize, systemClock, type Clock, type Logger } from "./report.js";
import type { CurrentStateStore } from "./store/types.js";
import type {
  CurrentStation,
  RawReading,
  ReadingValues,
  RunReport,
  Station,
  StationOutcome,
  Trend,
} from "./types.js";
import { createLimiter, formatInstant } from "./util.js";

/**
 * Replace a station's current-conditions document.
 */
export async function writeCurrentStation(
  store: CurrentStateStore,
  station: Station,
  latest: RawReading,
  trend: Trend,
  hourly: Record<string, ReadingValues>,
  updatedAt: string,
): Promise<CurrentStation> {
  const key = stationKey(station);
  const document: CurrentStation = {
    provider: station.provider,
    station_code: station.code,
    latest_reading: latest,
    trend,
    hourly_readings: hourly,
    readings_count: Object.keys(hourly).length,
    updated_at: updatedAt,
  };

  try {
    await store.putCurrent(key, document);
  } catch (cause) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    throw new WriteError(key, `Unable to write current state for ${key}: ${reason}`, { cause });
  }
  return document;
}

export type RealtimePhase = "idle" | "fanning-out" | "collecting" | "done";

export interface RealtimeUpdateOptions {
  providers: ProviderRegistry;
  store: CurrentStateStore;
  // Most provider requests in flight at once; 0 for no limit
  concurrency?: number;
  windowHours?: number;
  // Fetch and normalize without writing
  dryRun?: boolean;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Fetches, normalizes and writes every station concurrently. Each station
 * settles on its own; the run waits for all of them.
 */
export class RealtimeUpdater {
  private currentPhase: RealtimePhase = "idle";

  constructor(private readonly options: RealtimeUpdateOptions) {}

  get phase(): RealtimePhase {
    return this.currentPhase;
  }

  async run(stations: readonly Station[]): Promise<RunReport> {
    if (this.currentPhase !== "idle") {
      throw new Error(`Realtime update already ${this.currentPhase}`);
    }

    const { clock = systemClock, logger = console, concurrency = 0 } = this.options;
    const startedAt = clock();
    const limit = createLimiter(concurrency);

    this.currentPhase = "fanning-out";
    const tasks = stations.map((station) => limit(() => this.update(station, startedAt)));

    this.currentPhase = "collecting";
    const outcomes = await Promise.all(tasks);

    this.currentPhase = "done";
    const report = buildReport("realtime", startedAt, clock(), outcomes);
    logger.info(summarize(report));
    return report;
  }

  private async update(station: Station, now: Date): Promise<StationOutcome> {
    const { providers, store, windowHours, dryRun = false, logger = console } = this.options;
    const key = stationKey(station);

    try {
      const client = providers.get(station.provider);
      if (!client) {
        throw new FetchError(`No provider client for ${station.provider}`, { retryable: false });
      }

      const readings = await client.fetch(station, { hours: windowHours, now });
      const { latest, trend, ordered } = normalize(readings);
      if (!latest) {
        logger.warn(`[realtime] ${key}: no readings, skipped`);
        return { station: key, status: "skipped", readings: 0, reason: "no_readings" };
      }

      if (!dryRun) {
        await writeCurrentStation(
          store,
          station,
          latest,
          trend,
          toHourlyReadings(ordered),
          formatInstant(now.getTime()),
        );
      }

      logger.info(
        `[realtime] ${key}: ${ordered.length} readings, ${trend}, latest ${latest.timestamp}${
          dryRun ? " (dry run)" : ""
        }`,
      );
      return { station: key, status: "success", readings: ordered.length };
    } catch (error) {
      logger.error(`[realtime] ${key}: ${describeError(error).message}`);
      return { station: key, status: "failed", error: describeError(error) };
    }
  }
}

export function runRealtimeUpdate(
  stations: readonly Station[],
  options: RealtimeUpdateOptions,
): Promise<RunReport> {
  return new RealtimeUpdater(options).run(stations);
}
