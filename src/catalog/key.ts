import { CatalogError } from "../errors.js";
import type { Station } from "../types.js";

/**
 * The store key of a station: `{provider}_{code}`.
 */
export function stationKey(station: Pick<Station, "provider" | "code">): string {
  return `${station.provider}_${station.code}`;
}

/**
 * Split a store key back into provider and code. Provider ids never contain
 * an underscore, so the first one is the separator.
 */
export function parseStationKey(key: string): Pick<Station, "provider" | "code"> {
  const index = key.indexOf("_");
  if (index <= 0 || index === key.length - 1) {
    throw new CatalogError(`Invalid station key: ${key}`);
  }
  return { provider: key.slice(0, index), code: key.slice(index + 1) };
}
