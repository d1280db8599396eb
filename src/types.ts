export type Trend = "rising" | "falling" | "stable";

export const TRENDS: readonly Trend[] = ["rising", "falling", "stable"];

export interface Station {
  // Identity: provider id (e.g. "EC") and the provider's station code
  provider: string;
  code: string;

  // Descriptive metadata, used for search and display only
  name?: string;
  river?: string;
  region?: string;
  latitude?: number;
  longitude?: number;

  // Paddling runs that rely on this gauge
  runs?: string[];

  // Inactive stations stay in the catalog but are left out of both jobs
  active?: boolean;
}

export interface ReadingValues {
  level: number | null;
  discharge: number | null;
}

/**
 * One timestamped observation. `timestamp` is a UTC instant formatted as
 * `YYYY-MM-DDTHH:mm:ssZ`.
 */
export interface RawReading extends ReadingValues {
  timestamp: string;
}

/**
 * The current-conditions snapshot for one station, as exposed to external
 * readers. Always written as a whole.
 */
export interface CurrentStation {
  provider: string;
  station_code: string;
  latest_reading: RawReading;
  trend: Trend;

  // Keyed by timestamp; insertion order is chronological
  hourly_readings: Record<string, ReadingValues>;
  readings_count: number;
  updated_at: string;
}

export interface DailyValues {
  mean_level: number | null;
  mean_discharge: number | null;

  // Number of readings each mean was computed from
  level_samples: number;
  discharge_samples: number;
}

export interface DailyMean extends DailyValues {
  date: string; // YYYY-MM-DD, UTC calendar day
}

export interface YearlyBucket {
  year: number;
  daily_readings: Record<string, DailyValues>;
  updated_at: string;
}

/**
 * A merge-upsert of daily values into one station's yearly bucket.
 */
export interface DailyMergeOperation {
  station: string;
  year: number;
  daily_readings: Record<string, DailyValues>;
  updated_at: string;
}

/**
 * Bookkeeping for a station whose history has been backfilled. Its presence
 * marks the station as no longer new.
 */
export interface StationMetadata {
  provider: string;
  station_code: string;
  station_name: string;
  // When history was first backfilled, and when it last was
  first_data_fetch: string;
  last_updated: string;
  river_runs: string[];
}

export type JobName = "realtime" | "daily" | "backfill";

export type RunStatus = "success" | "partial" | "failed";

export type StationStatus = "success" | "skipped" | "failed";

export interface ErrorDetail {
  type: string;
  message: string;
}

export interface StationOutcome {
  station: string;
  status: StationStatus;
  readings?: number;
  dates?: number;
  years?: number[];
  reason?: string;
  error?: ErrorDetail;
}

export interface BatchSummary {
  commits: number;
  operations: number;
  failed_batches: number;
}

export interface RunReport {
  job: JobName;
  status: RunStatus;
  started_at: string;
  finished_at: string;
  duration_ms: number;
  succeeded: number;
  failed: number;
  skipped: number;
  total_readings: number;
  outcomes: StationOutcome[];
  batches?: BatchSummary;
}
