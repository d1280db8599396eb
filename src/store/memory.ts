import sortObject from "sort-object-keys";
import type {
  CurrentStation,
  DailyMergeOperation,
  StationMetadata,
  YearlyBucket,
} from "../types.js";
import { assertOperation, mergeDailyValues, sameDailyValues } from "./merge.js";
import type { StationStore } from "./types.js";

export const MEMORY_MAX_BATCH_OPERATIONS = 500;

/**
 * In-process store with the same document semantics as the SQLite store.
 * Documents are copied on the way in and out.
 */
export class MemoryStationStore implements StationStore {
  readonly maxBatchOperations: number = MEMORY_MAX_BATCH_OPERATIONS;
  private current = new Map<string, CurrentStation>();
  private history = new Map<string, Map<number, YearlyBucket>>();
  private metadata = new Map<string, StationMetadata>();

  async getCurrent(station: string): Promise<CurrentStation | null> {
    const document = this.current.get(station);
    return document ? structuredClone(document) : null;
  }

  async putCurrent(station: string, document: CurrentStation): Promise<void> {
    this.current.set(station, structuredClone(document));
  }

  async listCurrent(): Promise<string[]> {
    return [...this.current.keys()].sort();
  }

  async commitBatch(operations: readonly DailyMergeOperation[]): Promise<void> {
    if (operations.length > this.maxBatchOperations) {
      throw new Error(
        `Batch of ${operations.length} operations exceeds the limit of ${this.maxBatchOperations}`,
      );
    }

    // Apply to copies of the touched buckets, then swap them in together.
    // A bucket's updated_at moves only when one of its dates changes.
    const staged = new Map<string, YearlyBucket>();
    for (const operation of operations) {
      assertOperation(operation);

      const id = `${operation.station}/${operation.year}`;
      const bucket = staged.get(id) ??
        structuredClone(this.history.get(operation.station)?.get(operation.year)) ?? {
          year: operation.year,
          daily_readings: {},
          updated_at: operation.updated_at,
        };

      for (const [date, values] of Object.entries(operation.daily_readings)) {
        const stored = bucket.daily_readings[date];
        const merged = mergeDailyValues(stored, values);
        if (!sameDailyValues(stored, merged)) {
          bucket.daily_readings[date] = merged;
          bucket.updated_at = operation.updated_at;
        }
      }
      staged.set(id, bucket);
    }

    for (const operation of operations) {
      const bucket = staged.get(`${operation.station}/${operation.year}`);
      if (!bucket) continue;
      const years = this.history.get(operation.station) ?? new Map<number, YearlyBucket>();
      years.set(operation.year, bucket);
      this.history.set(operation.station, years);
    }
  }

  async getYear(station: string, year: number): Promise<YearlyBucket | null> {
    const bucket = this.history.get(station)?.get(year);
    if (!bucket) return null;

    const copy = structuredClone(bucket);
    return { ...copy, daily_readings: sortObject(copy.daily_readings) };
  }

  async listYears(station: string): Promise<number[]> {
    return [...(this.history.get(station)?.keys() ?? [])].sort((a, b) => a - b);
  }

  async getMetadata(station: string): Promise<StationMetadata | null> {
    const record = this.metadata.get(station);
    return record ? structuredClone(record) : null;
  }

  async putMetadata(station: string, metadata: StationMetadata): Promise<void> {
    this.metadata.set(station, structuredClone(metadata));
  }

  async close(): Promise<void> {
    this.current.clear();
    this.history.clear();
    this.metadata.clear();
  }
}
