export * from "./types.js";
export * from "./errors.js";
export {
  activeStations,
  createCatalogIndex,
  loadCatalog,
  parseCatalog,
  parseStationKey,
  stationKey,
  type CatalogFile,
  type CatalogIndex,
  type Position,
  type StationWithDistance,
} from "./catalog/index.js";
export {
  DEFAULT_HISTORY_DAYS,
  EC_DAILY_MEAN_URL,
  EC_PROVIDER,
  EC_REALTIME_URL,
  EnvironmentCanadaClient,
  createProviderRegistry,
  parseDailyMeansCsv,
  parseReadingsCsv,
  type DailyMeanRegistry,
  type DailyMeanSeries,
  type DailyMeanSource,
  type FetchDailyMeansOptions,
  type FetchReadingsOptions,
  type HttpFetch,
  type HttpResponse,
  type ProviderClient,
  type ProviderRegistry,
} from "./providers/index.js";
export {
  TREND_THRESHOLD,
  computeTrend,
  fromHourlyReadings,
  normalize,
  toHourlyReadings,
  type NormalizedReadings,
} from "./normalize.js";
export {
  RealtimeUpdater,
  runRealtimeUpdate,
  writeCurrentStation,
  type RealtimePhase,
  type RealtimeUpdateOptions,
} from "./realtime.js";
export {
  DailyAggregator,
  bucketByYear,
  computeDailyMeans,
  runDailyAggregation,
  toMergeOperations,
  type DailyAggregationOptions,
} from "./daily.js";
export {
  HistoryBackfiller,
  runBackfill,
  type BackfillOptions,
} from "./backfill.js";
export { BatchCommitter, type BatchState } from "./batch.js";
export { buildReport, runStatus, summarize, type Clock, type Logger } from "./report.js";
export { loadConfig, type Config } from "./config.js";
export {
  createProviders,
  loadStations,
  runBackfillJob,
  runDailyJob,
  runRealtimeJob,
  type BackfillJobOptions,
  type JobOptions,
  type RealtimeJobOptions,
} from "./jobs.js";
export * from "./store/index.js";
