import type { JSONSchemaType } from "ajv";
import { ConfigError } from "./errors.js";
import {
  DEFAULT_HISTORY_DAYS,
  EC_DAILY_MEAN_URL,
  EC_REALTIME_URL,
} from "./providers/environment-canada.js";
import { coercingAjv, errorsText } from "./validation.js";

export interface Config {
  catalogPath: string;
  databasePath: string;
  baseUrl: string;
  dailyMeanUrl: string;
  timeoutMs: number;
  retries: number;
  windowHours: number;
  concurrency: number;
  backfillDays: number;
}

const ENV_VARS = {
  catalogPath: "GAUGES_CATALOG",
  databasePath: "GAUGES_DATABASE",
  baseUrl: "EC_BASE_URL",
  dailyMeanUrl: "EC_DAILY_MEAN_URL",
  timeoutMs: "PROVIDER_TIMEOUT_MS",
  retries: "PROVIDER_RETRIES",
  windowHours: "REALTIME_WINDOW_HOURS",
  concurrency: "REALTIME_CONCURRENCY",
  backfillDays: "BACKFILL_DAYS",
} as const satisfies Record<keyof Config, string>;

const schema: JSONSchemaType<Config> = {
  type: "object",
  properties: {
    catalogPath: { type: "string", minLength: 1, default: "data/stations.json" },
    databasePath: { type: "string", minLength: 1, default: "data/gauges.db" },
    baseUrl: { type: "string", format: "uri", default: EC_REALTIME_URL },
    dailyMeanUrl: { type: "string", format: "uri", default: EC_DAILY_MEAN_URL },
    timeoutMs: { type: "integer", minimum: 1, default: 15_000 },
    retries: { type: "integer", minimum: 0, maximum: 10, default: 0 },
    windowHours: { type: "integer", minimum: 1, default: 720 },
    concurrency: { type: "integer", minimum: 0, default: 0 },
    backfillDays: { type: "integer", minimum: 1, default: DEFAULT_HISTORY_DAYS },
  },
  required: [
    "catalogPath",
    "databasePath",
    "baseUrl",
    "dailyMeanUrl",
    "timeoutMs",
    "retries",
    "windowHours",
    "concurrency",
    "backfillDays",
  ],
  additionalProperties: false,
};

const validate = coercingAjv.compile(schema);

/**
 * Read configuration from environment variables. Unset or empty variables
 * take their defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const data: Record<string, unknown> = {};
  for (const [field, name] of Object.entries(ENV_VARS)) {
    const value = env[name]?.trim();
    if (value) data[field] = value;
  }

  if (!validate(data)) {
    throw new ConfigError(`Invalid configuration: ${errorsText(validate.errors)}`);
  }
  return data;
}
