import type {
  CurrentStation,
  DailyMergeOperation,
  StationMetadata,
  YearlyBucket,
} from "../types.js";

/**
 * Current-conditions documents keyed by `{provider}_{station_code}`.
 * Single-document reads and writes are atomic.
 */
export interface CurrentStateStore {
  getCurrent(station: string): Promise<CurrentStation | null>;

  /** Replace the whole document; nothing of the previous one survives. */
  putCurrent(station: string, document: CurrentStation): Promise<void>;

  listCurrent(): Promise<string[]>;
}

/**
 * Daily means partitioned as station → year → date.
 */
export interface HistoricalStore {
  /** Most operations a single `commitBatch` call may carry. */
  readonly maxBatchOperations: number;

  /**
   * Merge every operation, all or nothing. Rejects without applying any of
   * them when one fails.
   */
  commitBatch(operations: readonly DailyMergeOperation[]): Promise<void>;

  getYear(station: string, year: number): Promise<YearlyBucket | null>;

  listYears(station: string): Promise<number[]>;
}

export interface MetadataStore {
  getMetadata(station: string): Promise<StationMetadata | null>;

  /** Replace the station's metadata record. */
  putMetadata(station: string, metadata: StationMetadata): Promise<void>;
}

export interface StationStore extends CurrentStateStore, HistoricalStore, MetadataStore {
  close(): Promise<void>;
}
