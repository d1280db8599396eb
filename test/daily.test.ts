import { describe, test, expect, vi } from "vitest";
import {
  bucketByYear,
  computeDailyMeans,
  runDailyAggregation,
  toMergeOperations,
} from "../src/daily.js";
import { MemoryStationStore } from "../src/store/memory.js";
import { SqliteStationStore } from "../src/store/sqlite.js";
import type { StationStore } from "../src/store/types.js";
import type { CurrentStation, DailyMergeOperation, RawReading } from "../src/types.js";
import { toHourlyReadings } from "../src/normalize.js";

const cheakamus = { provider: "EC", code: "08GA072" };
const lillooet = { provider: "EC", code: "08MG005" };
const bow = { provider: "EC", code: "05BB001" };

const clock = () => new Date("2025-01-02T00:00:00Z");

function silentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function currentStation(station_code: string, readings: RawReading[]): CurrentStation {
  const latest = readings.at(-1) ?? { timestamp: "2025-01-01T00:00:00Z", level: null, discharge: null };
  return {
    provider: "EC",
    station_code,
    latest_reading: latest,
    trend: "stable",
    hourly_readings: toHourlyReadings(readings),
    readings_count: readings.length,
    updated_at: "2025-01-01T12:00:00Z",
  };
}

const yearEnd: RawReading[] = [
  { timestamp: "2024-12-31T22:00:00Z", level: 1.4, discharge: 9 },
  { timestamp: "2024-12-31T23:00:00Z", level: 1.6, discharge: 11 },
  { timestamp: "2025-01-01T01:00:00Z", level: 1.7, discharge: 12 },
];

describe("computeDailyMeans", () => {
  test("averages the non-null values of each UTC day", () => {
    expect(
      computeDailyMeans([
        { timestamp: "2024-06-01T01:00:00Z", level: 1, discharge: null },
        { timestamp: "2024-06-01T02:00:00Z", level: 2, discharge: null },
        { timestamp: "2024-06-01T03:00:00Z", level: 3, discharge: null },
      ]),
    ).toEqual([
      {
        date: "2024-06-01",
        mean_level: 2,
        mean_discharge: null,
        level_samples: 3,
        discharge_samples: 0,
      },
    ]);
  });

  test("skips nulls per field", () => {
    const [day] = computeDailyMeans([
      { timestamp: "2024-06-01T01:00:00Z", level: 1, discharge: 10 },
      { timestamp: "2024-06-01T02:00:00Z", level: null, discharge: 20 },
      { timestamp: "2024-06-01T03:00:00Z", level: 3, discharge: null },
    ]);
    expect(day).toEqual({
      date: "2024-06-01",
      mean_level: 2,
      mean_discharge: 15,
      level_samples: 2,
      discharge_samples: 2,
    });
  });

  test("groups by UTC date in date order", () => {
    const means = computeDailyMeans([
      { timestamp: "2024-06-02T00:30:00Z", level: 4, discharge: null },
      { timestamp: "2024-06-01T23:30:00-07:00", level: 5, discharge: null },
      { timestamp: "2024-06-01T12:00:00Z", level: 1, discharge: null },
    ]);
    expect(means.map((m) => [m.date, m.mean_level])).toEqual([
      ["2024-06-01", 1],
      ["2024-06-02", 4.5],
    ]);
  });

  test("a day without any values still gets a record", () => {
    expect(
      computeDailyMeans([{ timestamp: "2024-06-01T01:00:00Z", level: null, discharge: null }]),
    ).toEqual([
      {
        date: "2024-06-01",
        mean_level: null,
        mean_discharge: null,
        level_samples: 0,
        discharge_samples: 0,
      },
    ]);
  });
});

describe("year buckets", () => {
  test("a run spanning new year targets two buckets", () => {
    const means = computeDailyMeans(yearEnd);
    expect(means.map((m) => m.date)).toEqual(["2024-12-31", "2025-01-01"]);
    expect([...bucketByYear(means).keys()]).toEqual([2024, 2025]);

    expect(toMergeOperations("EC_08GA072", means, "2025-01-02T00:00:00Z")).toEqual([
      {
        station: "EC_08GA072",
        year: 2024,
        daily_readings: {
          "2024-12-31": {
            mean_level: 1.5,
            mean_discharge: 10,
            level_samples: 2,
            discharge_samples: 2,
          },
        },
        updated_at: "2025-01-02T00:00:00Z",
      },
      {
        station: "EC_08GA072",
        year: 2025,
        daily_readings: {
          "2025-01-01": {
            mean_level: 1.7,
            mean_discharge: 12,
            level_samples: 1,
            discharge_samples: 1,
          },
        },
        updated_at: "2025-01-02T00:00:00Z",
      },
    ] satisfies DailyMergeOperation[]);
  });
});

describe("runDailyAggregation", () => {
  test("writes daily means and reports each station", async () => {
    const store = new MemoryStationStore();
    await store.putCurrent("EC_08GA072", currentStation("08GA072", yearEnd));

    const report = await runDailyAggregation([cheakamus, lillooet], {
      store,
      clock,
      logger: silentLogger(),
    });

    expect(report).toMatchObject({
      job: "daily",
      status: "success",
      succeeded: 1,
      failed: 0,
      skipped: 1,
      total_readings: 3,
      batches: { commits: 1, operations: 2, failed_batches: 0 },
    });
    expect(report.outcomes).toEqual([
      { station: "EC_08GA072", status: "success", readings: 3, dates: 2, years: [2024, 2025] },
      { station: "EC_08MG005", status: "skipped", reason: "no_current_state" },
    ]);

    expect(await store.getYear("EC_08GA072", 2024)).toEqual({
      year: 2024,
      daily_readings: {
        "2024-12-31": {
          mean_level: 1.5,
          mean_discharge: 10,
          level_samples: 2,
          discharge_samples: 2,
        },
      },
      updated_at: "2025-01-02T00:00:00Z",
    });
    expect(await store.listYears("EC_08GA072")).toEqual([2024, 2025]);
  });

  test.each([
    ["MemoryStationStore", () => new MemoryStationStore()],
    ["SqliteStationStore", () => new SqliteStationStore(":memory:")],
  ])(
    "running twice leaves the same state as running once (%s)",
    async (_, createStore: () => StationStore) => {
      const store = createStore();
      await store.putCurrent("EC_08GA072", currentStation("08GA072", yearEnd));
      const logger = silentLogger();

      await runDailyAggregation([cheakamus], { store, clock, logger });
      const once = [
        await store.getYear("EC_08GA072", 2024),
        await store.getYear("EC_08GA072", 2025),
      ];

      const later = () => new Date("2025-01-02T00:05:00Z");
      await runDailyAggregation([cheakamus], { store, clock: later, logger });
      const twice = [
        await store.getYear("EC_08GA072", 2024),
        await store.getYear("EC_08GA072", 2025),
      ];

      expect(twice).toEqual(once);
      expect(twice[0]?.updated_at).toBe("2025-01-02T00:00:00Z");
      await store.close();
    },
  );

  test("never replaces a mean with one from fewer readings", async () => {
    const store = new MemoryStationStore();
    const options = { store, clock, logger: silentLogger() };

    await store.putCurrent("EC_08GA072", currentStation("08GA072", yearEnd));
    await runDailyAggregation([cheakamus], options);

    // The window has moved on: only the last reading of Dec 31 remains
    await store.putCurrent(
      "EC_08GA072",
      currentStation("08GA072", [
        { timestamp: "2024-12-31T23:00:00Z", level: 1.6, discharge: 11 },
        { timestamp: "2025-01-01T01:00:00Z", level: 1.5, discharge: 12 },
        { timestamp: "2025-01-01T02:00:00Z", level: 2.5, discharge: 14 },
      ]),
    );
    await runDailyAggregation([cheakamus], options);

    expect((await store.getYear("EC_08GA072", 2024))?.daily_readings).toEqual({
      "2024-12-31": { mean_level: 1.5, mean_discharge: 10, level_samples: 2, discharge_samples: 2 },
    });
    expect((await store.getYear("EC_08GA072", 2025))?.daily_readings).toEqual({
      "2025-01-01": { mean_level: 2, mean_discharge: 13, level_samples: 2, discharge_samples: 2 },
    });
  });

  test("stations without readings are skipped", async () => {
    const store = new MemoryStationStore();
    await store.putCurrent("EC_08GA072", currentStation("08GA072", []));

    const report = await runDailyAggregation([cheakamus], {
      store,
      clock,
      logger: silentLogger(),
    });

    expect(report.status).toBe("success");
    expect(report.outcomes).toEqual([
      { station: "EC_08GA072", status: "skipped", reason: "no_readings" },
    ]);
    expect(report.batches).toEqual({ commits: 0, operations: 0, failed_batches: 0 });
  });

  test("a read failure fails only that station", async () => {
    class FlakyStore extends MemoryStationStore {
      override async getCurrent(station: string) {
        if (station === "EC_05BB001") throw new Error("disk I/O error");
        return super.getCurrent(station);
      }
    }
    const store = new FlakyStore();
    await store.putCurrent("EC_08GA072", currentStation("08GA072", yearEnd));
    await store.putCurrent("EC_05BB001", currentStation("05BB001", yearEnd));

    const report = await runDailyAggregation([bow, cheakamus], {
      store,
      clock,
      logger: silentLogger(),
    });

    expect(report.status).toBe("partial");
    expect(report.outcomes[0]).toEqual({
      station: "EC_05BB001",
      status: "failed",
      error: { type: "ReadError", message: "Unable to read current state for EC_05BB001" },
    });
    expect(report.outcomes[1]?.status).toBe("success");
  });

  test("a failed batch fails every station in it", async () => {
    class RejectingStore extends MemoryStationStore {
      override async commitBatch(): Promise<void> {
        throw new Error("quota exceeded");
      }
    }
    const store = new RejectingStore();
    await store.putCurrent("EC_08GA072", currentStation("08GA072", yearEnd));
    await store.putCurrent("EC_08MG005", currentStation("08MG005", yearEnd.slice(0, 1)));
    const logger = silentLogger();

    const report = await runDailyAggregation([cheakamus, lillooet], { store, clock, logger });

    expect(report.status).toBe("failed");
    expect(report.outcomes).toEqual([
      {
        station: "EC_08GA072",
        status: "failed",
        error: {
          type: "BatchCommitError",
          message: "Batch of 3 operations for 2 stations was rolled back: quota exceeded",
        },
      },
      {
        station: "EC_08MG005",
        status: "failed",
        error: {
          type: "BatchCommitError",
          message: "Batch of 3 operations for 2 stations was rolled back: quota exceeded",
        },
      },
    ]);
    expect(report.batches).toEqual({ commits: 0, operations: 0, failed_batches: 1 });
    expect(logger.error).toHaveBeenCalledWith(
      "[daily] Batch of 3 operations for 2 stations was rolled back: quota exceeded",
    );
    expect(await store.listYears("EC_08GA072")).toEqual([]);
  });
});
