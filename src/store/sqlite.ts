import type { JSONSchemaType } from "ajv";
import Database from "better-sqlite3";
import { readFileSync } from "fs";
import {
  TRENDS,
  type CurrentStation,
  type DailyMergeOperation,
  type DailyValues,
  type ReadingValues,
  type StationMetadata,
  type Trend,
  type YearlyBucket,
} from "../types.js";
import { ajv } from "../validation.js";
import { assertOperation, mergeDailyValues, sameDailyValues } from "./merge.js";
import type { StationStore } from "./types.js";

const SCHEMA = readFileSync(new URL("./schema.sql", import.meta.url), "utf-8");

// Same per-commit write limit as the document store the data is published to
export const SQLITE_MAX_BATCH_OPERATIONS = 500;

interface CurrentRow {
  provider: string;
  station_code: string;
  trend: string;
  latest_timestamp: string;
  latest_level: number | null;
  latest_discharge: number | null;
  readings_count: number;
  updated_at: string;
}

interface ReadingRow extends ReadingValues {
  timestamp: string;
}

interface DailyRow extends DailyValues {
  date: string;
}

interface MetadataRow extends Omit<StationMetadata, "river_runs"> {
  river_runs: string;
}

type Nullable = number | null;

const runsSchema: JSONSchemaType<string[]> = { type: "array", items: { type: "string" } };
const validateRuns = ajv.compile(runsSchema);

function isTrend(value: string): value is Trend {
  return TRENDS.some((trend) => trend === value);
}

/**
 * Station store backed by a SQLite file (or `:memory:`). Every public write is
 * a single transaction.
 */
export class SqliteStationStore implements StationStore {
  readonly maxBatchOperations = SQLITE_MAX_BATCH_OPERATIONS;
  private readonly db: Database.Database;
  private readonly replaceCurrent: (station: string, document: CurrentStation) => void;
  private readonly mergeBatch: (operations: readonly DailyMergeOperation[]) => void;

  private readonly selectCurrent: Database.Statement<[string], CurrentRow>;
  private readonly selectReadings: Database.Statement<[string], ReadingRow>;
  private readonly selectCurrentKeys: Database.Statement<[], { station_key: string }>;
  private readonly selectYear: Database.Statement<[string, number], { updated_at: string }>;
  private readonly selectYears: Database.Statement<[string], { year: number }>;
  private readonly selectDailyForYear: Database.Statement<[string, number], DailyRow>;
  private readonly selectMetadata: Database.Statement<[string], MetadataRow>;
  private readonly upsertMetadata: Database.Statement<
    [string, string, string, string, string, string, string]
  >;

  constructor(path: string) {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA);

    const db = this.db;

    this.selectCurrent = db.prepare<[string], CurrentRow>(
      `SELECT provider, station_code, trend, latest_timestamp, latest_level,
              latest_discharge, readings_count, updated_at
       FROM station_current WHERE station_key = ?`,
    );
    this.selectReadings = db.prepare<[string], ReadingRow>(
      `SELECT timestamp, level, discharge FROM station_current_readings
       WHERE station_key = ? ORDER BY position`,
    );
    this.selectCurrentKeys = db.prepare<[], { station_key: string }>(
      "SELECT station_key FROM station_current ORDER BY station_key",
    );
    this.selectYear = db.prepare<[string, number], { updated_at: string }>(
      "SELECT updated_at FROM station_years WHERE station_key = ? AND year = ?",
    );
    this.selectYears = db.prepare<[string], { year: number }>(
      "SELECT year FROM station_years WHERE station_key = ? ORDER BY year",
    );
    this.selectDailyForYear = db.prepare<[string, number], DailyRow>(
      `SELECT date, mean_level, mean_discharge, level_samples, discharge_samples
       FROM station_daily WHERE station_key = ? AND year = ? ORDER BY date`,
    );

    this.selectMetadata = db.prepare<[string], MetadataRow>(
      `SELECT provider, station_code, station_name, first_data_fetch, last_updated, river_runs
       FROM station_metadata WHERE station_key = ?`,
    );
    this.upsertMetadata = db.prepare<[string, string, string, string, string, string, string]>(
      `INSERT INTO station_metadata (
        station_key, provider, station_code, station_name, first_data_fetch, last_updated, river_runs
      ) VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT (station_key) DO UPDATE SET
        provider = excluded.provider,
        station_code = excluded.station_code,
        station_name = excluded.station_name,
        first_data_fetch = excluded.first_data_fetch,
        last_updated = excluded.last_updated,
        river_runs = excluded.river_runs`,
    );

    const deleteReadings = db.prepare<[string]>(
      "DELETE FROM station_current_readings WHERE station_key = ?",
    );
    const deleteCurrent = db.prepare<[string]>(
      "DELETE FROM station_current WHERE station_key = ?",
    );
    const insertCurrent = db.prepare<
      [string, string, string, Trend, string, Nullable, Nullable, number, string]
    >(
      `INSERT INTO station_current (
        station_key, provider, station_code, trend, latest_timestamp,
        latest_level, latest_discharge, readings_count, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    const insertReading = db.prepare<[string, number, string, Nullable, Nullable]>(
      `INSERT INTO station_current_readings (station_key, position, timestamp, level, discharge)
       VALUES (?, ?, ?, ?, ?)`,
    );

    this.replaceCurrent = db.transaction((station: string, document: CurrentStation) => {
      deleteReadings.run(station);
      deleteCurrent.run(station);

      const latest = document.latest_reading;
      insertCurrent.run(
        station,
        document.provider,
        document.station_code,
        document.trend,
        latest.timestamp,
        latest.level,
        latest.discharge,
        document.readings_count,
        document.updated_at,
      );

      let position = 0;
      for (const [timestamp, { level, discharge }] of Object.entries(
        document.hourly_readings,
      )) {
        insertReading.run(station, position++, timestamp, level, discharge);
      }
    });

    const insertYear = db.prepare<[string, number, string]>(
      `INSERT INTO station_years (station_key, year, updated_at) VALUES (?, ?, ?)
       ON CONFLICT (station_key, year) DO NOTHING`,
    );
    const touchYear = db.prepare<[string, string, number]>(
      "UPDATE station_years SET updated_at = ? WHERE station_key = ? AND year = ?",
    );
    const selectDaily = db.prepare<[string, string], DailyRow>(
      `SELECT date, mean_level, mean_discharge, level_samples, discharge_samples
       FROM station_daily WHERE station_key = ? AND date = ?`,
    );
    const upsertDaily = db.prepare<
      [string, number, string, Nullable, Nullable, number, number]
    >(
      `INSERT INTO station_daily (
        station_key, year, date, mean_level, mean_discharge, level_samples, discharge_samples
      ) VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT (station_key, date) DO UPDATE SET
        year = excluded.year,
        mean_level = excluded.mean_level,
        mean_discharge = excluded.mean_discharge,
        level_samples = excluded.level_samples,
        discharge_samples = excluded.discharge_samples`,
    );

    this.mergeBatch = db.transaction((operations: readonly DailyMergeOperation[]) => {
      for (const operation of operations) {
        assertOperation(operation);
        const { station, year } = operation;
        insertYear.run(station, year, operation.updated_at);

        let changed = false;
        for (const [date, values] of Object.entries(operation.daily_readings)) {
          const stored = selectDaily.get(station, date);
          const merged = mergeDailyValues(stored, values);
          if (sameDailyValues(stored, merged)) continue;

          changed = true;
          upsertDaily.run(
            station,
            year,
            date,
            merged.mean_level,
            merged.mean_discharge,
            merged.level_samples,
            merged.discharge_samples,
          );
        }
        if (changed) touchYear.run(operation.updated_at, station, year);
      }
    });
  }

  async getCurrent(station: string): Promise<CurrentStation | null> {
    const row = this.selectCurrent.get(station);
    if (!row) return null;

    if (!isTrend(row.trend)) {
      throw new Error(`Stored trend "${row.trend}" for ${station} is not valid`);
    }

    const hourly: Record<string, ReadingValues> = {};
    for (const { timestamp, level, discharge } of this.selectReadings.all(station)) {
      hourly[timestamp] = { level, discharge };
    }

    return {
      provider: row.provider,
      station_code: row.station_code,
      latest_reading: {
        timestamp: row.latest_timestamp,
        level: row.latest_level,
        discharge: row.latest_discharge,
      },
      trend: row.trend,
      hourly_readings: hourly,
      readings_count: row.readings_count,
      updated_at: row.updated_at,
    };
  }

  async putCurrent(station: string, document: CurrentStation): Promise<void> {
    this.replaceCurrent(station, document);
  }

  async listCurrent(): Promise<string[]> {
    return this.selectCurrentKeys.all().map((row) => row.station_key);
  }

  async commitBatch(operations: readonly DailyMergeOperation[]): Promise<void> {
    if (operations.length > this.maxBatchOperations) {
      throw new Error(
        `Batch of ${operations.length} operations exceeds the limit of ${this.maxBatchOperations}`,
      );
    }
    this.mergeBatch(operations);
  }

  async getYear(station: string, year: number): Promise<YearlyBucket | null> {
    const bucket = this.selectYear.get(station, year);
    if (!bucket) return null;

    const daily: Record<string, DailyValues> = {};
    for (const { date, ...values } of this.selectDailyForYear.all(station, year)) {
      daily[date] = values;
    }

    return { year, daily_readings: daily, updated_at: bucket.updated_at };
  }

  async listYears(station: string): Promise<number[]> {
    return this.selectYears.all(station).map((row) => row.year);
  }

  async getMetadata(station: string): Promise<StationMetadata | null> {
    const row = this.selectMetadata.get(station);
    if (!row) return null;

    const runs: unknown = JSON.parse(row.river_runs);
    if (!validateRuns(runs)) {
      throw new Error(`Stored river runs for ${station} are not a list of strings`);
    }
    return { ...row, river_runs: runs };
  }

  async putMetadata(station: string, metadata: StationMetadata): Promise<void> {
    this.upsertMetadata.run(
      station,
      metadata.provider,
      metadata.station_code,
      metadata.station_name,
      metadata.first_data_fetch,
      metadata.last_updated,
      JSON.stringify(metadata.river_runs),
    );
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
