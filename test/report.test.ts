import { describe, test, expect } from "vitest";
import { BatchCommitError, FetchError, describeError } from "../src/errors.js";
import { buildReport, runStatus, summarize } from "../src/report.js";

describe("runStatus", () => {
  test("success when nothing failed", () => {
    expect(runStatus([])).toBe("success");
    expect(
      runStatus([
        { station: "EC_08GA072", status: "success" },
        { station: "EC_08MG005", status: "skipped" },
      ]),
    ).toBe("success");
  });

  test("failed when everything failed", () => {
    expect(runStatus([{ station: "EC_08GA072", status: "failed" }])).toBe("failed");
  });

  test("partial otherwise", () => {
    expect(
      runStatus([
        { station: "EC_08GA072", status: "success" },
        { station: "EC_08MG005", status: "failed" },
      ]),
    ).toBe("partial");
  });
});

test("buildReport counts outcomes", () => {
  const report = buildReport(
    "daily",
    new Date("2024-06-02T00:00:00Z"),
    new Date("2024-06-02T00:00:01.250Z"),
    [
      { station: "EC_08GA072", status: "success", readings: 48 },
      { station: "EC_08MG005", status: "skipped", reason: "no_readings" },
      { station: "EC_05BB001", status: "failed" },
    ],
    { commits: 1, operations: 2, failed_batches: 0 },
  );

  expect(report).toMatchObject({
    job: "daily",
    status: "partial",
    started_at: "2024-06-02T00:00:00Z",
    finished_at: "2024-06-02T00:00:01.250Z",
    duration_ms: 1250,
    succeeded: 1,
    failed: 1,
    skipped: 1,
    total_readings: 48,
  });
  expect(summarize(report)).toBe(
    "[daily] partial: 1 succeeded, 1 failed, 1 skipped in 1250ms (2 operations in 1 commits, 0 failed batches)",
  );
});

describe("errors", () => {
  test("carry their class name and code", () => {
    const error = new FetchError("Fetch failed for EC_08GA072: 500 Internal Server Error", {
      status: 500,
    });
    expect(error.name).toBe("FetchError");
    expect(error.code).toBe("fetch");
    expect(describeError(error)).toEqual({
      type: "FetchError",
      message: "Fetch failed for EC_08GA072: 500 Internal Server Error",
    });
  });

  test("batch errors name the batch size", () => {
    const error = new BatchCommitError(["EC_08GA072"], 3);
    expect(error.message).toBe("Batch of 3 operations for 1 stations was rolled back");
  });

  test("describeError accepts anything", () => {
    expect(describeError("boom")).toEqual({ type: "Error", message: "boom" });
  });
});
