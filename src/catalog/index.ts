import { readFile } from "fs/promises";
import schema from "../../schemas/stations.schema.json" with { type: "json" };
import { CatalogError } from "../errors.js";
import type { Station } from "../types.js";
import { ajv, errorsText } from "../validation.js";
import { stationKey } from "./key.js";

export interface CatalogFile {
  stations: Station[];
}

const validate = ajv.compile<CatalogFile>(schema);

/**
 * Validate parsed catalog content and return its stations sorted by key.
 */
export function parseCatalog(data: unknown, source = "catalog"): Station[] {
  if (!validate(data)) {
    throw new CatalogError(`Invalid station catalog ${source}: ${errorsText(validate.errors)}`);
  }

  const seen = new Set<string>();
  for (const station of data.stations) {
    const key = stationKey(station);
    if (seen.has(key)) {
      throw new CatalogError(`Duplicate station ${key} in ${source}`);
    }
    seen.add(key);
  }

  return [...data.stations].sort((a, b) =>
    stationKey(a).localeCompare(stationKey(b)),
  );
}

export async function loadCatalog(path: string): Promise<Station[]> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw new CatalogError(`Unable to read station catalog ${path}`, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new CatalogError(`Station catalog ${path} is not valid JSON`, { cause: error });
  }

  return parseCatalog(data, path);
}

/**
 * Stations that take part in scheduled jobs.
 */
export function activeStations(stations: readonly Station[]): Station[] {
  return stations.filter((station) => station.active !== false);
}

export { stationKey, parseStationKey } from "./key.js";
export {
  createCatalogIndex,
  type CatalogIndex,
  type Position,
  type StationWithDistance,
} from "./search.js";
