import { BatchCommitError } from "./errors.js";
import type { HistoricalStore } from "./store/types.js";
import type { BatchSummary, DailyMergeOperation } from "./types.js";

export type BatchState = "accumulating" | "flushing";

/**
 * Groups merge operations into atomic commits of at most
 * `store.maxBatchOperations` operations.
 *
 * A batch is committed as soon as it reaches the ceiling, and the remainder on
 * `finalize()`. When a commit fails the batch is dropped as a whole, a
 * `BatchCommitError` is thrown and the committer carries on with an empty
 * batch.
 */
export class BatchCommitter {
  readonly ceiling: number;
  private currentState: BatchState = "accumulating";
  private pending: DailyMergeOperation[] = [];
  private commits = 0;
  private operations = 0;
  private failedBatches = 0;

  constructor(private readonly store: HistoricalStore) {
    const ceiling = store.maxBatchOperations;
    if (!Number.isInteger(ceiling) || ceiling < 1) {
      throw new RangeError(`Invalid batch ceiling: ${ceiling}`);
    }
    this.ceiling = ceiling;
  }

  get state(): BatchState {
    return this.currentState;
  }

  // Operations waiting for the next commit
  get size(): number {
    return this.pending.length;
  }

  async enqueue(operation: DailyMergeOperation): Promise<void> {
    if (this.currentState === "flushing") {
      throw new Error("Cannot enqueue while a batch is being committed");
    }
    this.pending.push(operation);
    await this.flushIfNeeded();
  }

  async flushIfNeeded(): Promise<void> {
    if (this.pending.length >= this.ceiling) {
      await this.flush();
    }
  }

  async finalize(): Promise<BatchSummary> {
    if (this.pending.length > 0) {
      await this.flush();
    }
    return this.summary();
  }

  summary(): BatchSummary {
    return {
      commits: this.commits,
      operations: this.operations,
      failed_batches: this.failedBatches,
    };
  }

  private async flush(): Promise<void> {
    const batch = this.pending;
    this.pending = [];
    this.currentState = "flushing";

    try {
      await this.store.commitBatch(batch);
      this.commits++;
      this.operations += batch.length;
    } catch (error) {
      this.failedBatches++;
      const stations = [...new Set(batch.map((op) => op.station))];
      throw new BatchCommitError(stations, batch.length, { cause: error });
    } finally {
      this.currentState = "accumulating";
    }
  }
}
