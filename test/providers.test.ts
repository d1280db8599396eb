import { describe, test, expect, vi } from "vitest";
import { FetchError, ParseError } from "../src/errors.js";
import {
  EC_DAILY_MEAN_URL,
  EC_REALTIME_URL,
  EnvironmentCanadaClient,
  createProviderRegistry,
  parseDailyMeansCsv,
  parseDateOrNull,
  parseNumberOrNull,
  parseReadingsCsv,
  type HttpFetch,
} from "../src/providers/index.js";
import { OFFICIAL_DAILY_SAMPLES } from "../src/store/merge.js";

const station = { provider: "EC", code: "08GA072" };

const API_CSV = [
  "STATION_NUMBER,DATETIME,LEVEL,DISCHARGE",
  "08GA072,2024-06-01T10:05:00Z,7.978,",
  "08GA072,2024-06-01T10:00:00Z,7.976,12.3",
  "08GA072,not-a-date,7.9,12",
  "08GA072,2024-06-01T09:55:00Z,None,abc",
].join("\n");

const DATAMART_CSV = [
  "\uFEFFID,Date,Water Level / Niveau d'eau (m),Grade,Discharge / Débit (cms),QA/QC",
  "08GA072,2024-06-01T10:00:00-08:00,7.976,,12.3,1",
  "",
].join("\n");

const DAILY_CSV = [
  "STATION_NUMBER,STATION_NAME,DATE,LEVEL,DISCHARGE",
  "08GA072,CHEAKAMUS RIVER ABOVE MILLAR CREEK,2024-05-30,7.95,18.2",
  "08GA072,CHEAKAMUS RIVER ABOVE MILLAR CREEK,2024-05-31,,",
  "08GA072,CHEAKAMUS RIVER ABOVE MILLAR CREEK,2024-02-30,7.9,18",
  "08GA072,CHEAKAMUS RIVER ABOVE MILLAR CREEK,2024-06-01,7.99,",
].join("\n");

describe("parseReadingsCsv", () => {
  test("reads API headers", () => {
    const { readings, dropped } = parseReadingsCsv(API_CSV);

    expect(readings).toEqual([
      { timestamp: "2024-06-01T10:05:00Z", level: 7.978, discharge: null },
      { timestamp: "2024-06-01T10:00:00Z", level: 7.976, discharge: 12.3 },
      { timestamp: "2024-06-01T09:55:00Z", level: null, discharge: null },
    ]);
    expect(dropped).toHaveLength(1);
    expect(dropped[0]).toBeInstanceOf(ParseError);
    expect(dropped[0]?.row).toBe(4);
    expect(dropped[0]?.message).toBe('Row 4: unreadable timestamp "not-a-date"');
  });

  test("reads Datamart headers and converts offsets to UTC", () => {
    const { readings, dropped } = parseReadingsCsv(DATAMART_CSV);

    expect(readings).toEqual([
      { timestamp: "2024-06-01T18:00:00Z", level: 7.976, discharge: 12.3 },
    ]);
    expect(dropped).toEqual([]);
  });

  test("drops every row when there is no timestamp column", () => {
    const { readings, dropped } = parseReadingsCsv("LEVEL,DISCHARGE\n1.2,3.4\n1.3,3.5");
    expect(readings).toEqual([]);
    expect(dropped).toHaveLength(2);
  });

  test("missing value columns become null", () => {
    const { readings } = parseReadingsCsv("DATETIME\n2024-06-01T10:00:00Z");
    expect(readings).toEqual([
      { timestamp: "2024-06-01T10:00:00Z", level: null, discharge: null },
    ]);
  });

  test("empty body", () => {
    expect(parseReadingsCsv("")).toEqual({ readings: [], dropped: [] });
  });
});

test("parseNumberOrNull", () => {
  expect(parseNumberOrNull(" 1.5 ")).toBe(1.5);
  expect(parseNumberOrNull("-0.25")).toBe(-0.25);
  expect(parseNumberOrNull("")).toBeNull();
  expect(parseNumberOrNull("None")).toBeNull();
  expect(parseNumberOrNull("NaN")).toBeNull();
  expect(parseNumberOrNull("Infinity")).toBeNull();
  expect(parseNumberOrNull("12 m")).toBeNull();
  expect(parseNumberOrNull(undefined)).toBeNull();
  expect(parseNumberOrNull(".5")).toBe(0.5);
  expect(parseNumberOrNull("+3.")).toBe(3);
  expect(parseNumberOrNull("0x10")).toBeNull();
  expect(parseNumberOrNull("1e3")).toBeNull();
  expect(parseNumberOrNull("0b11")).toBeNull();
  expect(parseNumberOrNull(".")).toBeNull();
});

test("parseDateOrNull", () => {
  expect(parseDateOrNull("2024-06-01")).toBe("2024-06-01");
  expect(parseDateOrNull(" 2024-06-01T00:00:00Z ")).toBe("2024-06-01");
  expect(parseDateOrNull("2024-06-01 00:00:00")).toBe("2024-06-01");
  expect(parseDateOrNull("2024-02-30")).toBeNull();
  expect(parseDateOrNull("2024-6-1")).toBeNull();
  expect(parseDateOrNull(undefined)).toBeNull();
});

describe("parseDailyMeansCsv", () => {
  test("gives each official value a full day of samples", () => {
    const { means, stationName, dropped } = parseDailyMeansCsv(DAILY_CSV);

    expect(means).toEqual([
      {
        date: "2024-05-30",
        mean_level: 7.95,
        mean_discharge: 18.2,
        level_samples: OFFICIAL_DAILY_SAMPLES,
        discharge_samples: OFFICIAL_DAILY_SAMPLES,
      },
      {
        date: "2024-06-01",
        mean_level: 7.99,
        mean_discharge: null,
        level_samples: OFFICIAL_DAILY_SAMPLES,
        discharge_samples: 0,
      },
    ]);
    expect(stationName).toBe("CHEAKAMUS RIVER ABOVE MILLAR CREEK");
    expect(dropped.map((error) => error.message)).toEqual([
      'Row 4: unreadable date "2024-02-30"',
    ]);
  });

  test("station name is null without that column", () => {
    const { means, stationName } = parseDailyMeansCsv("DATE,LEVEL\n2024-06-01,1.5");
    expect(stationName).toBeNull();
    expect(means).toHaveLength(1);
  });
});

describe("EnvironmentCanadaClient", () => {
  function respond(body: string, status = 200, statusText = "OK") {
    return vi.fn<HttpFetch>(async () => ({
      ok: status >= 200 && status < 300,
      status,
      statusText,
      text: async () => body,
    }));
  }

  test("requests whole days of daily means as CSV", () => {
    const client = new EnvironmentCanadaClient({ fetch: respond("") });
    const url = new URL(
      client.dailyMeanUrlFor(station, { days: 2, now: new Date("2024-06-01T12:00:00Z") }),
    );

    expect(`${url.origin}${url.pathname}`).toBe(EC_DAILY_MEAN_URL);
    expect(Object.fromEntries(url.searchParams)).toEqual({
      STATION_NUMBER: "08GA072",
      f: "csv",
      sortby: "DATE",
      limit: "10000",
      datetime: "2024-05-30T00:00:00Z/2024-06-01T23:59:59Z",
    });
  });

  test("defaults to five years of daily means", () => {
    const client = new EnvironmentCanadaClient({ fetch: respond("") });
    const url = new URL(
      client.dailyMeanUrlFor(station, { now: new Date("2024-06-01T00:00:00Z") }),
    );
    expect(url.searchParams.get("datetime")).toBe(
      "2019-06-03T00:00:00Z/2024-06-01T23:59:59Z",
    );
  });

  test("fetches and parses daily means", async () => {
    const fetch = respond(DAILY_CSV);
    const onParseErrors = vi.fn();
    const client = new EnvironmentCanadaClient({
      dailyMeanUrl: "http://localhost:8080/daily",
      fetch,
      onParseErrors,
    });

    const series = await client.fetchDailyMeans(station, {
      now: new Date("2024-06-01T00:00:00Z"),
    });

    expect(fetch.mock.calls[0]?.[0]).toMatch(/^http:\/\/localhost:8080\/daily\?/);
    expect(series.station_name).toBe("CHEAKAMUS RIVER ABOVE MILLAR CREEK");
    expect(series.means.map((mean) => mean.date)).toEqual(["2024-05-30", "2024-06-01"]);
    expect(onParseErrors).toHaveBeenCalledWith(station, 1);
  });

  test("requests the station's window as CSV", () => {
    const client = new EnvironmentCanadaClient({ fetch: respond("") });
    const url = new URL(
      client.requestUrl(station, { hours: 24, now: new Date("2024-06-01T12:00:00Z") }),
    );

    expect(`${url.origin}${url.pathname}`).toBe(EC_REALTIME_URL);
    expect(Object.fromEntries(url.searchParams)).toEqual({
      STATION_NUMBER: "08GA072",
      f: "csv",
      sortby: "-DATETIME",
      limit: "10000",
      datetime: "2024-05-31T12:00:00Z/2024-06-01T12:00:00Z",
    });
  });

  test("defaults to a 30 day window", () => {
    const client = new EnvironmentCanadaClient({ fetch: respond("") });
    const url = new URL(
      client.requestUrl(station, { now: new Date("2024-06-01T00:00:00Z") }),
    );
    expect(url.searchParams.get("datetime")).toBe(
      "2024-05-02T00:00:00Z/2024-06-01T00:00:00Z",
    );
  });

  test("uses a custom base URL", () => {
    const client = new EnvironmentCanadaClient({
      baseUrl: "http://localhost:8080/items",
      fetch: respond(""),
    });
    expect(client.requestUrl(station)).toMatch(/^http:\/\/localhost:8080\/items\?/);
  });

  test("fetches and parses readings", async () => {
    const fetch = respond(API_CSV);
    const onParseErrors = vi.fn();
    const client = new EnvironmentCanadaClient({ fetch, onParseErrors });

    const readings = await client.fetch(station);

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(readings).toHaveLength(3);
    expect(readings[0]).toEqual({
      timestamp: "2024-06-01T10:05:00Z",
      level: 7.978,
      discharge: null,
    });
    expect(onParseErrors).toHaveBeenCalledWith(station, 1);
  });

  test("non-2xx responses are retryable fetch errors", async () => {
    const text = vi.fn(async () => "<html>maintenance</html>");
    const client = new EnvironmentCanadaClient({
      fetch: async () => ({ ok: false, status: 503, statusText: "Service Unavailable", text }),
    });

    const error = await client.fetch(station).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FetchError);
    expect(error).toHaveProperty(
      "message",
      "Fetch failed for EC_08GA072: 503 Service Unavailable",
    );
    expect(error).toHaveProperty("status", 503);
    expect(error).toHaveProperty("retryable", true);
    // The error body is consumed before throwing
    expect(text).toHaveBeenCalledTimes(1);
  });

  test("transport failures are fetch errors", async () => {
    const cause = new Error("socket hang up");
    const client = new EnvironmentCanadaClient({
      timeoutMs: 500,
      fetch: async () => {
        throw cause;
      },
    });

    const error = await client.fetch(station).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FetchError);
    expect(error).toHaveProperty(
      "message",
      "Request for EC_08GA072 failed (timeout 500ms): socket hang up",
    );
    expect(error).toHaveProperty("cause", cause);
  });
});

describe("createProviderRegistry", () => {
  test("indexes clients by provider", () => {
    const client = new EnvironmentCanadaClient();
    expect(createProviderRegistry([client]).get("EC")).toBe(client);
  });

  test("rejects duplicate providers", () => {
    expect(() =>
      createProviderRegistry([new EnvironmentCanadaClient(), new EnvironmentCanadaClient()]),
    ).toThrow("Duplicate provider client: EC");
  });
});
