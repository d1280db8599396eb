import createFetch from "make-fetch-happen";
import { FetchError } from "../errors.js";
import type { RawReading, Station } from "../types.js";
import { formatInstant } from "../util.js";
import { parseDailyMeansCsv, parseReadingsCsv } from "./csv.js";
import type {
  DailyMeanSeries,
  DailyMeanSource,
  FetchDailyMeansOptions,
  FetchReadingsOptions,
  HttpFetch,
  HttpResponse,
  ProviderClient,
} from "./index.js";

export const EC_PROVIDER = "EC";
export const EC_REALTIME_URL =
  "https://api.weather.gc.ca/collections/hydrometric-realtime/items";
export const EC_DAILY_MEAN_URL =
  "https://api.weather.gc.ca/collections/hydrometric-daily-mean/items";

const DEFAULT_WINDOW_HOURS = 720;
// Five years of daily means
export const DEFAULT_HISTORY_DAYS = 1825;
const MAX_ROWS = 10000;

export interface EnvironmentCanadaOptions {
  baseUrl?: string;
  dailyMeanUrl?: string;
  timeoutMs?: number;
  retries?: number;
  // Replaces the HTTP layer, for tests
  fetch?: HttpFetch;
  onParseErrors?: (station: Station, count: number) => void;
}

/**
 * Environment Canada hydrometric data, read as CSV from the OGC API
 * `hydrometric-realtime` and `hydrometric-daily-mean` collections.
 */
export class EnvironmentCanadaClient implements ProviderClient, DailyMeanSource {
  readonly provider = EC_PROVIDER;
  private readonly baseUrl: string;
  private readonly dailyMeanUrl: string;
  private readonly timeoutMs: number;
  private readonly http: HttpFetch;
  private readonly onParseErrors: EnvironmentCanadaOptions["onParseErrors"];

  constructor({
    baseUrl = EC_REALTIME_URL,
    dailyMeanUrl = EC_DAILY_MEAN_URL,
    timeoutMs = 15_000,
    retries = 0,
    fetch,
    onParseErrors,
  }: EnvironmentCanadaOptions = {}) {
    this.baseUrl = baseUrl;
    this.dailyMeanUrl = dailyMeanUrl;
    this.timeoutMs = timeoutMs;
    this.onParseErrors = onParseErrors;
    this.http =
      fetch ??
      createFetch.defaults({
        cache: "no-store",
        retry: { retries },
        timeout: timeoutMs,
      });
  }

  requestUrl(
    station: Station,
    { hours = DEFAULT_WINDOW_HOURS, now = new Date() }: FetchReadingsOptions = {},
  ): string {
    const end = now.getTime();
    const start = end - hours * 3_600_000;

    const url = new URL(this.baseUrl);
    url.searchParams.set("STATION_NUMBER", station.code);
    url.searchParams.set("f", "csv");
    url.searchParams.set("sortby", "-DATETIME");
    url.searchParams.set("limit", String(MAX_ROWS));
    url.searchParams.set("datetime", `${formatInstant(start)}/${formatInstant(end)}`);
    return url.toString();
  }

  /**
   * Whole UTC days, from `days` before `now` through the day of `now`.
   */
  dailyMeanUrlFor(
    station: Station,
    { days = DEFAULT_HISTORY_DAYS, now = new Date() }: FetchDailyMeansOptions = {},
  ): string {
    const end = formatInstant(now.getTime()).slice(0, 10);
    const start = formatInstant(now.getTime() - days * 86_400_000).slice(0, 10);

    const url = new URL(this.dailyMeanUrl);
    url.searchParams.set("STATION_NUMBER", station.code);
    url.searchParams.set("f", "csv");
    url.searchParams.set("sortby", "DATE");
    url.searchParams.set("limit", String(MAX_ROWS));
    url.searchParams.set("datetime", `${start}T00:00:00Z/${end}T23:59:59Z`);
    return url.toString();
  }

  async fetch(
    station: Station,
    options: FetchReadingsOptions = {},
  ): Promise<RawReading[]> {
    const body = await this.get(station, this.requestUrl(station, options));

    const { readings, dropped } = parseReadingsCsv(body);
    if (dropped.length > 0) {
      this.onParseErrors?.(station, dropped.length);
    }
    return readings;
  }

  async fetchDailyMeans(
    station: Station,
    options: FetchDailyMeansOptions = {},
  ): Promise<DailyMeanSeries> {
    const body = await this.get(station, this.dailyMeanUrlFor(station, options));

    const { means, stationName, dropped } = parseDailyMeansCsv(body);
    if (dropped.length > 0) {
      this.onParseErrors?.(station, dropped.length);
    }
    return { station_name: stationName, means };
  }

  private async get(station: Station, url: string): Promise<string> {
    const key = `${station.provider}_${station.code}`;

    let response: HttpResponse;
    let body: string;
    try {
      response = await this.http(url);
      // Error bodies are read too, so the connection is released
      body = await response.text();
    } catch (error) {
      throw new FetchError(
        `Request for ${key} failed (timeout ${this.timeoutMs}ms): ${
          error instanceof Error ? error.message : String(error)
        }`,
        { cause: error },
      );
    }

    if (!response.ok) {
      throw new FetchError(
        `Fetch failed for ${key}: ${response.status} ${response.statusText}`,
        { status: response.status },
      );
    }
    return body;
  }
}
