import { runBackfill } from "./backfill.js";
import { activeStations, loadCatalog, stationKey } from "./catalog/index.js";
import type { Config } from "./config.js";
import { runDailyAggregation } from "./daily.js";
import {
  EnvironmentCanadaClient,
  createProviderRegistry,
  type DailyMeanRegistry,
  type DailyMeanSource,
  type ProviderClient,
  type ProviderRegistry,
} from "./providers/index.js";
import { runRealtimeUpdate } from "./realtime.js";
import type { Clock, Logger } from "./report.js";
import { MemoryStationStore } from "./store/memory.js";
import { SqliteStationStore } from "./store/sqlite.js";
import type { StationStore } from "./store/types.js";
import type { RunReport, Station } from "./types.js";

export interface JobOptions {
  config: Config;
  // Only the first N active stations, in key order
  limit?: number;
  logger?: Logger;
  clock?: Clock;
  openStore?: (path: string) => StationStore;
}

export interface RealtimeJobOptions extends JobOptions {
  dryRun?: boolean;
  providers?: ProviderRegistry;
}

export interface BackfillJobOptions extends JobOptions {
  // Days of history to request; defaults to the configured BACKFILL_DAYS
  days?: number;
  force?: boolean;
  dryRun?: boolean;
  sources?: DailyMeanRegistry;
}

const openSqliteStore = (path: string): StationStore => new SqliteStationStore(path);

/**
 * The active stations of the configured catalog. Throws `CatalogError`, which
 * aborts the run.
 */
export async function loadStations(config: Config, limit?: number): Promise<Station[]> {
  const stations = activeStations(await loadCatalog(config.catalogPath));
  return limit === undefined ? stations : stations.slice(0, limit);
}

/**
 * One client per provider, serving both current readings and daily means.
 * `job` prefixes the warnings they log.
 */
export function createProviders(
  config: Config,
  logger: Logger = console,
  job = "realtime",
): ReadonlyMap<string, ProviderClient & DailyMeanSource> {
  return createProviderRegistry([
    new EnvironmentCanadaClient({
      baseUrl: config.baseUrl,
      dailyMeanUrl: config.dailyMeanUrl,
      timeoutMs: config.timeoutMs,
      retries: config.retries,
      onParseErrors: (station, count) =>
        logger.warn(`[${job}] ${stationKey(station)}: dropped ${count} unreadable rows`),
    }),
  ]);
}

export async function runRealtimeJob({
  config,
  limit,
  logger = console,
  clock,
  dryRun = false,
  providers = createProviders(config, logger),
  openStore = openSqliteStore,
}: RealtimeJobOptions): Promise<RunReport> {
  const stations = await loadStations(config, limit);
  const store = dryRun ? new MemoryStationStore() : openStore(config.databasePath);

  try {
    return await runRealtimeUpdate(stations, {
      providers,
      store,
      concurrency: config.concurrency,
      windowHours: config.windowHours,
      dryRun,
      clock,
      logger,
    });
  } finally {
    await store.close();
  }
}

export async function runDailyJob({
  config,
  limit,
  logger = console,
  clock,
  openStore = openSqliteStore,
}: JobOptions): Promise<RunReport> {
  const stations = await loadStations(config, limit);
  const store = openStore(config.databasePath);

  try {
    return await runDailyAggregation(stations, { store, clock, logger });
  } finally {
    await store.close();
  }
}

/**
 * Backfill the history of active stations that have none yet. A dry run reads
 * the store to find new stations but writes nothing.
 */
export async function runBackfillJob({
  config,
  limit,
  logger = console,
  clock,
  days = config.backfillDays,
  force = false,
  dryRun = false,
  sources = createProviders(config, logger, "backfill"),
  openStore = openSqliteStore,
}: BackfillJobOptions): Promise<RunReport> {
  const stations = await loadStations(config, limit);
  const store = openStore(config.databasePath);

  try {
    return await runBackfill(stations, { sources, store, days, force, dryRun, clock, logger });
  } finally {
    await store.close();
  }
}
