import type { DailyMean, RawReading, Station } from "../types.js";

export interface FetchReadingsOptions {
  // How far back to request, in hours
  hours?: number;
  now?: Date;
}

/**
 * Fetches and parses one station's time series. Pure I/O and parsing: the
 * returned readings are in whatever order the provider sent them.
 */
export interface ProviderClient {
  readonly provider: string;
  fetch(station: Station, options?: FetchReadingsOptions): Promise<RawReading[]>;
}

export interface FetchDailyMeansOptions {
  // How many days back to request, ending with the day of `now`
  days?: number;
  now?: Date;
}

export interface DailyMeanSeries {
  station_name: string | null;
  means: DailyMean[];
}

/**
 * Fetches a provider's official daily means for one station, for backfilling
 * history.
 */
export interface DailyMeanSource {
  readonly provider: string;
  fetchDailyMeans(station: Station, options?: FetchDailyMeansOptions): Promise<DailyMeanSeries>;
}

/**
 * Minimal response surface the provider clients rely on. Satisfied by the
 * responses of make-fetch-happen and of the global fetch.
 */
export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type HttpFetch = (url: string) => Promise<HttpResponse>;

export type ProviderRegistry = ReadonlyMap<string, ProviderClient>;

export type DailyMeanRegistry = ReadonlyMap<string, DailyMeanSource>;

export function createProviderRegistry<T extends { readonly provider: string }>(
  clients: readonly T[],
): ReadonlyMap<string, T> {
  const registry = new Map<string, T>();
  for (const client of clients) {
    if (registry.has(client.provider)) {
      throw new Error(`Duplicate provider client: ${client.provider}`);
    }
    registry.set(client.provider, client);
  }
  return registry;
}

export {
  EnvironmentCanadaClient,
  DEFAULT_HISTORY_DAYS,
  EC_DAILY_MEAN_URL,
  EC_PROVIDER,
  EC_REALTIME_URL,
} from "./environment-canada.js";
export {
  parseDailyMeansCsv,
  parseDateOrNull,
  parseNumberOrNull,
  parseReadingsCsv,
  type ParsedDailyMeans,
  type ParsedSeries,
} from "./csv.js";
