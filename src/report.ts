import type {
  BatchSummary,
  JobName,
  RunReport,
  RunStatus,
  StationOutcome,
} from "./types.js";
import { formatInstant } from "./util.js";

export type Logger = Pick<Console, "info" | "warn" | "error">;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * `success` when no station failed, `failed` when every station failed,
 * `partial` otherwise.
 */
export function runStatus(outcomes: readonly StationOutcome[]): RunStatus {
  const failed = outcomes.filter((o) => o.status === "failed").length;
  if (failed === 0) return "success";
  return failed === outcomes.length ? "failed" : "partial";
}

export function buildReport(
  job: JobName,
  startedAt: Date,
  finishedAt: Date,
  outcomes: StationOutcome[],
  batches?: BatchSummary,
): RunReport {
  const count = (status: StationOutcome["status"]) =>
    outcomes.filter((o) => o.status === status).length;

  return {
    job,
    status: runStatus(outcomes),
    started_at: formatInstant(startedAt.getTime()),
    finished_at: formatInstant(finishedAt.getTime()),
    duration_ms: finishedAt.getTime() - startedAt.getTime(),
    succeeded: count("success"),
    failed: count("failed"),
    skipped: count("skipped"),
    total_readings: outcomes.reduce((sum, o) => sum + (o.readings ?? 0), 0),
    outcomes,
    ...(batches ? { batches } : {}),
  };
}

export function summarize(report: RunReport): string {
  const line = `[${report.job}] ${report.status}: ${report.succeeded} succeeded, ${report.failed} failed, ${report.skipped} skipped in ${report.duration_ms}ms`;
  if (!report.batches) return line;
  const { commits, operations, failed_batches } = report.batches;
  return `${line} (${operations} operations in ${commits} commits, ${failed_batches} failed batches)`;
}
