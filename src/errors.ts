import type { ErrorDetail } from "./types.js";

export type PipelineErrorCode =
  | "catalog"
  | "config"
  | "fetch"
  | "parse"
  | "read"
  | "write"
  | "batch_commit";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The station catalog could not be loaded or is invalid. Fatal for a run.
 */
export class CatalogError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super("catalog", message, options);
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super("config", message, options);
  }
}

export interface FetchErrorOptions extends ErrorOptions {
  status?: number;
  retryable?: boolean;
}

/**
 * Transport-level failure talking to a provider: network error, timeout or a
 * non-2xx response. Retried by re-running the job, never inline.
 */
export class FetchError extends PipelineError {
  readonly status: number | undefined;
  readonly retryable: boolean;

  constructor(message: string, { status, retryable = true, ...options }: FetchErrorOptions = {}) {
    super("fetch", message, options);
    this.status = status;
    this.retryable = retryable;
  }
}

/**
 * A single provider row that could not be turned into a reading.
 */
export class ParseError extends PipelineError {
  readonly row: number;

  constructor(row: number, message: string) {
    super("parse", `Row ${row}: ${message}`);
    this.row = row;
  }
}

export class ReadError extends PipelineError {
  readonly station: string;

  constructor(station: string, message: string, options?: ErrorOptions) {
    super("read", message, options);
    this.station = station;
  }
}

export class WriteError extends PipelineError {
  readonly station: string;

  constructor(station: string, message: string, options?: ErrorOptions) {
    super("write", message, options);
    this.station = station;
  }
}

/**
 * A flushed batch failed and was rolled back as a whole.
 */
export class BatchCommitError extends PipelineError {
  readonly stations: string[];
  readonly operations: number;

  constructor(stations: string[], operations: number, options?: ErrorOptions) {
    const cause = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(
      "batch_commit",
      `Batch of ${operations} operations for ${stations.length} stations was rolled back${cause}`,
      options,
    );
    this.stations = stations;
    this.operations = operations;
  }
}

export function describeError(error: unknown): ErrorDetail {
  if (error instanceof Error) {
    return { type: error.name, message: error.message };
  }
  return { type: "Error", message: String(error) };
}
