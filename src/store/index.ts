export type {
  CurrentStateStore,
  HistoricalStore,
  MetadataStore,
  StationStore,
} from "./types.js";
export { MemoryStationStore, MEMORY_MAX_BATCH_OPERATIONS } from "./memory.js";
export { SqliteStationStore, SQLITE_MAX_BATCH_OPERATIONS } from "./sqlite.js";
export {
  OFFICIAL_DAILY_SAMPLES,
  assertOperation,
  mergeDailyValues,
  sameDailyValues,
} from "./merge.js";
