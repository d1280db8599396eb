#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { pathToFileURL } from "url";
import {
  createCatalogIndex,
  loadCatalog,
  stationKey,
  type StationWithDistance,
} from "../src/catalog/index.js";
import { loadConfig, type Config } from "../src/config.js";
import { runBackfillJob, runDailyJob, runRealtimeJob } from "../src/jobs.js";
import type { DailyMeanRegistry, ProviderRegistry } from "../src/providers/index.js";
import { summarize, type Clock, type Logger } from "../src/report.js";
import { SqliteStationStore } from "../src/store/sqlite.js";
import type { StationStore } from "../src/store/types.js";
import type { RunReport, Station } from "../src/types.js";

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  // Writes command output (stdout)
  print?: (text: string) => void;
  setExitCode?: (code: number) => void;
  openStore?: (path: string) => StationStore;
  providers?: ProviderRegistry;
  sources?: DailyMeanRegistry;
  clock?: Clock;
}

type GlobalOptions = {
  catalog?: string;
  database?: string;
};

type RealtimeOptions = {
  limit?: number;
  dryRun?: boolean;
  concurrency?: number;
  windowHours?: number;
  json?: boolean;
};

type DailyOptions = {
  limit?: number;
  json?: boolean;
};

type BackfillOptions = {
  limit?: number;
  days?: number;
  force?: boolean;
  dryRun?: boolean;
  json?: boolean;
};

type StationsOptions = {
  near?: { latitude: number; longitude: number };
  maxResults: number;
  json?: boolean;
};

type ViewOptions = {
  year?: number;
  json?: boolean;
};

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return n;
}

function parsePosition(value: string): { latitude: number; longitude: number } {
  const [latitude, longitude, ...rest] = value.split(",").map((part) => Number(part.trim()));
  if (
    latitude === undefined ||
    longitude === undefined ||
    rest.length > 0 ||
    !Number.isFinite(latitude) ||
    !Number.isFinite(longitude) ||
    Math.abs(latitude) > 90 ||
    Math.abs(longitude) > 180
  ) {
    throw new InvalidArgumentError("Expected latitude,longitude.");
  }
  return { latitude, longitude };
}

function formatReport(report: RunReport): string {
  const lines = [summarize(report)];
  for (const outcome of report.outcomes) {
    if (outcome.status === "failed") {
      lines.push(`  ${outcome.station}: ${outcome.error?.type}: ${outcome.error?.message}`);
    }
  }
  return lines.join("\n");
}

function formatStation(station: Station, km?: number): string {
  const place = [station.river, station.region].filter(Boolean).join(", ");
  const columns = [stationKey(station), station.name ?? "", place];
  if (km !== undefined) columns.push(`${km.toFixed(1)} km`);
  if (station.active === false) columns.push("(inactive)");
  return columns.join("\t");
}

export function createProgram(dependencies: CliDependencies = {}): Command {
  const {
    env = process.env,
    print = (text: string) => console.log(text),
    setExitCode = (code: number) => {
      process.exitCode = code;
    },
    openStore = (path: string): StationStore => new SqliteStationStore(path),
    providers,
    sources,
    clock,
  } = dependencies;

  const program = new Command();

  program
    .name("river-gauges")
    .description("River gauge ingestion and daily aggregation")
    .version("0.1.0")
    .option("--catalog <path>", "station catalog file (GAUGES_CATALOG)")
    .option("--database <path>", "SQLite database file (GAUGES_DATABASE)")
    .exitOverride();

  function resolveConfig(overrides: Partial<Config> = {}): Config {
    const { catalog, database } = program.opts<GlobalOptions>();
    const config = loadConfig(env);
    return {
      ...config,
      ...overrides,
      catalogPath: catalog ?? config.catalogPath,
      databasePath: database ?? config.databasePath,
    };
  }

  // Progress lines go to stderr when stdout carries JSON
  function jobLogger(json: boolean | undefined): Logger {
    if (dependencies.logger) return dependencies.logger;
    return json
      ? { info: console.error, warn: console.warn, error: console.error }
      : console;
  }

  function finish(report: RunReport, json: boolean | undefined) {
    print(json ? JSON.stringify(report, null, 2) : formatReport(report));
    if (report.status === "failed") setExitCode(1);
  }

  program
    .command("realtime")
    .description("Fetch every active station and replace its current conditions")
    .option("--limit <n>", "only the first N stations", parseInteger)
    .option("--dry-run", "fetch and normalize without writing")
    .option("--concurrency <n>", "most requests in flight, 0 for no limit", parseInteger)
    .option("--window-hours <n>", "hours of readings to request", parseInteger)
    .option("--json", "print the run report as JSON")
    .action(async (options: RealtimeOptions) => {
      const overrides: Partial<Config> = {};
      if (options.concurrency !== undefined) overrides.concurrency = options.concurrency;
      if (options.windowHours !== undefined) overrides.windowHours = options.windowHours;

      const report = await runRealtimeJob({
        config: resolveConfig(overrides),
        limit: options.limit,
        dryRun: options.dryRun,
        logger: jobLogger(options.json),
        clock,
        providers,
        openStore,
      });
      finish(report, options.json);
    });

  program
    .command("daily")
    .description("Roll current readings up into daily means by year")
    .option("--limit <n>", "only the first N stations", parseInteger)
    .option("--json", "print the run report as JSON")
    .action(async (options: DailyOptions) => {
      const report = await runDailyJob({
        config: resolveConfig(),
        limit: options.limit,
        logger: jobLogger(options.json),
        clock,
        openStore,
      });
      finish(report, options.json);
    });

  program
    .command("backfill")
    .description("Seed the history of new stations with official daily means")
    .option("--limit <n>", "only the first N stations", parseInteger)
    .option("--days <n>", "days of history to request (BACKFILL_DAYS)", parseInteger)
    .option("--force", "also backfill stations that already have history")
    .option("--dry-run", "fetch without writing")
    .option("--json", "print the run report as JSON")
    .action(async (options: BackfillOptions) => {
      const report = await runBackfillJob({
        config: resolveConfig(),
        limit: options.limit,
        days: options.days,
        force: options.force,
        dryRun: options.dryRun,
        logger: jobLogger(options.json),
        clock,
        sources,
        openStore,
      });
      finish(report, options.json);
    });

  program
    .command("stations")
    .description("List or search the station catalog")
    .argument("[query]", "text to search for in name, river, region or code")
    .option("--near <lat,lon>", "sort by distance from a position", parsePosition)
    .option("--max-results <n>", "most stations to list", parseInteger, 20)
    .option("--json", "print stations as JSON")
    .action(async (query: string | undefined, options: StationsOptions) => {
      const catalog = await loadCatalog(resolveConfig().catalogPath);
      const index = createCatalogIndex(catalog);
      const matches = query ? new Set(index.search(query, { maxResults: Infinity })) : null;
      const filter = (station: Station) => !matches || matches.has(station);

      let results: StationWithDistance[] | Station[];
      if (options.near) {
        results = index.near({ ...options.near, maxResults: options.maxResults, filter });
      } else if (query) {
        results = index.search(query, { maxResults: options.maxResults });
      } else {
        results = catalog.slice(0, options.maxResults);
      }

      if (options.json) {
        print(JSON.stringify(results, null, 2));
        return;
      }
      for (const result of results) {
        print(Array.isArray(result) ? formatStation(...result) : formatStation(result));
      }
    });

  program
    .command("view")
    .description("Show a station's stored current conditions or yearly daily means")
    .argument("<station>", "station key, e.g. EC_08GA072")
    .option("--year <year>", "show daily means for this year", parseInteger)
    .option("--json", "print as JSON")
    .action(async (station: string, options: ViewOptions) => {
      const store = openStore(resolveConfig().databasePath);
      try {
        if (options.year !== undefined) {
          const bucket = await store.getYear(station, options.year);
          if (!bucket) throw new Error(`No daily means for ${station} in ${options.year}`);
          if (options.json) {
            print(JSON.stringify(bucket, null, 2));
            return;
          }
          print(`${station} ${bucket.year} (updated ${bucket.updated_at})`);
          for (const [date, values] of Object.entries(bucket.daily_readings)) {
            print(`${date}\tlevel ${values.mean_level ?? "-"}\tdischarge ${values.mean_discharge ?? "-"}`);
          }
          return;
        }

        const current = await store.getCurrent(station);
        if (!current) throw new Error(`No current state for ${station}`);
        const years = await store.listYears(station);
        if (options.json) {
          print(JSON.stringify({ ...current, years }, null, 2));
          return;
        }
        const { latest_reading: latest } = current;
        print(`${station} ${current.trend} (updated ${current.updated_at})`);
        print(
          `latest ${latest.timestamp}\tlevel ${latest.level ?? "-"}\tdischarge ${latest.discharge ?? "-"}`,
        );
        print(`${current.readings_count} readings; history: ${years.join(", ") || "none"}`);
      } finally {
        await store.close();
      }
    });

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      // Commander has already printed help, version or usage errors
      process.exitCode = err.exitCode;
      return;
    }
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exitCode = 1;
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  void main();
}
