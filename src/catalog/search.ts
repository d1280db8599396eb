import MiniSearch, { type Options } from "minisearch";
import type { Station } from "../types.js";
import { stationKey } from "./key.js";

export type Position = Latitude & Longitude;
type Latitude = { latitude: number } | { lat: number };
type Longitude = { longitude: number } | { lon: number } | { lng: number };

export type NearestOptions = Position & {
  // Kilometers
  maxDistance?: number;
  filter?: (station: Station) => boolean;
};

export type NearOptions = NearestOptions & {
  maxResults?: number;
};

export type TextSearchOptions = {
  filter?: (station: Station) => boolean;
  maxResults?: number;
};

/**
 * A tuple of a station and its distance from a given point, in kilometers.
 */
export type StationWithDistance = [Station, number];

export interface CatalogIndex {
  near(options: NearOptions): StationWithDistance[];
  nearest(options: NearestOptions): StationWithDistance | null;
  search(query: string, options?: TextSearchOptions): Station[];
}

type IndexedStation = Station & { id: string };

const SEARCH_FIELDS = ["name", "river", "region", "code"] as const;

const textSearchIndexOptions: Options<IndexedStation> = {
  fields: [...SEARCH_FIELDS],
  extractField: (station, fieldName) => {
    switch (fieldName) {
      case "id":
        return station.id;
      case "name":
        return station.name ?? "";
      case "river":
        return station.river ?? "";
      case "region":
        return station.region ?? "";
      case "code":
        return station.code;
      default:
        return "";
    }
  },
  searchOptions: {
    boost: {
      name: 3,
    },
    fuzzy: 0.2,
    prefix: true,
  },
};

const EARTH_RADIUS_KM = 6371;

export function distance(
  [lon1, lat1]: [number, number],
  [lon2, lat2]: [number, number],
): number {
  const toRad = (d: number) => (d * Math.PI) / 180;
  const dLat = toRad(lat2 - lat1);
  const dLon = toRad(lon2 - lon1);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(lat1)) * Math.cos(toRad(lat2)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

export function positionToPoint(options: Position): [number, number] {
  const longitude =
    "longitude" in options
      ? options.longitude
      : "lon" in options
        ? options.lon
        : options.lng;
  const latitude = "latitude" in options ? options.latitude : options.lat;
  return [longitude, latitude];
}

function stationPoint(station: Station): [number, number] | null {
  const { latitude, longitude } = station;
  return latitude === undefined || longitude === undefined
    ? null
    : [longitude, latitude];
}

/**
 * Build text and location lookups over a set of stations. Stations without
 * coordinates are searchable by text only.
 */
export function createCatalogIndex(stations: readonly Station[]): CatalogIndex {
  const stationMap = new Map(stations.map((s) => [stationKey(s), s]));

  const textIndex = new MiniSearch<IndexedStation>(textSearchIndexOptions);
  textIndex.addAll(stations.map((s) => ({ ...s, id: stationKey(s) })));

  function near({
    maxDistance = Infinity,
    maxResults = 10,
    filter,
    ...position
  }: NearOptions): StationWithDistance[] {
    const point = positionToPoint(position);
    const results: StationWithDistance[] = [];

    for (const station of stations) {
      const other = stationPoint(station);
      if (!other || (filter && !filter(station))) continue;
      const km = distance(point, other);
      if (km <= maxDistance) results.push([station, km]);
    }

    return results.sort((a, b) => a[1] - b[1]).slice(0, maxResults);
  }

  return {
    near,

    nearest(options: NearestOptions): StationWithDistance | null {
      return near({ ...options, maxResults: 1 })[0] ?? null;
    },

    search(
      query: string,
      { filter, maxResults = 20 }: TextSearchOptions = {},
    ): Station[] {
      const searchOptions: Parameters<typeof textIndex.search>[1] = {};

      if (filter) {
        searchOptions.filter = (result) => {
          const station = stationMap.get(String(result.id));
          return station ? filter(station) : false;
        };
      }

      return textIndex
        .search(query, searchOptions)
        .slice(0, maxResults)
        .flatMap((result) => stationMap.get(String(result.id)) ?? []);
    },
  };
}
