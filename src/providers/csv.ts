import Papa from "papaparse";
import { ParseError } from "../errors.js";
import { OFFICIAL_DAILY_SAMPLES } from "../store/merge.js";
import type { DailyMean, RawReading } from "../types.js";
import { formatInstant, parseInstant } from "../util.js";

/**
 * Header names for each column, across the provider's API and Datamart
 * exports. Matched case-insensitively.
 */
export const COLUMN_ALIASES = {
  timestamp: ["DATETIME", "Date", "datetime"],
  level: ["LEVEL", "Water Level / Niveau d'eau (m)", "level"],
  discharge: ["DISCHARGE", "Discharge / Débit (cms)", "discharge"],
} as const;

type Column = keyof typeof COLUMN_ALIASES;

const COLUMNS: Column[] = ["timestamp", "level", "discharge"];

export const DAILY_COLUMN_ALIASES = {
  date: ["DATE", "Date", "date"],
  level: ["LEVEL", "level"],
  discharge: ["DISCHARGE", "discharge"],
  name: ["STATION_NAME", "station_name"],
} as const;

type DailyColumn = keyof typeof DAILY_COLUMN_ALIASES;

const DAILY_COLUMNS: DailyColumn[] = ["date", "level", "discharge", "name"];

export interface ParsedDailyMeans {
  means: DailyMean[];
  // First non-empty station name in the export, if it has that column
  stationName: string | null;
  dropped: ParseError[];
}

export interface ParsedSeries {
  readings: RawReading[];
  // Rows dropped because their timestamp could not be read
  dropped: ParseError[];
}

const MISSING_VALUES = new Set(["", "none", "null", "nan", "n/a"]);
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const DATE = /^(\d{4}-\d{2}-\d{2})([T ].*)?$/;

/**
 * Plain decimal notation only; hex, exponents and anything else are null.
 */
export function parseNumberOrNull(value: string | undefined): number | null {
  const text = value?.trim();
  if (text === undefined || MISSING_VALUES.has(text.toLowerCase())) return null;
  if (!DECIMAL.test(text)) return null;
  const n = Number(text);
  return Number.isFinite(n) ? n : null;
}

/**
 * A calendar date (`YYYY-MM-DD`), optionally followed by a time that is
 * ignored. Returns null for anything else, including impossible dates.
 */
export function parseDateOrNull(value: string | undefined): string | null {
  const date = DATE.exec(value?.trim() ?? "")?.[1];
  if (date === undefined) return null;
  const ms = parseInstant(date);
  return ms !== null && formatInstant(ms).startsWith(date) ? date : null;
}

function resolveColumns<C extends string>(
  fields: string[],
  columnNames: readonly C[],
  aliases: Record<C, readonly string[]>,
): Partial<Record<C, string>> {
  const byName = new Map(fields.map((f) => [f.trim().toLowerCase(), f]));
  const columns: Partial<Record<C, string>> = {};

  for (const column of columnNames) {
    for (const alias of aliases[column]) {
      const field = byName.get(alias.toLowerCase());
      if (field) {
        columns[column] = field;
        break;
      }
    }
  }

  return columns;
}

/**
 * Parse a provider CSV time series. Rows with an unreadable timestamp are
 * dropped; unreadable numbers become null. Never throws on row content.
 */
function readCsv(content: string) {
  return Papa.parse<Record<string, string | undefined>>(content.trim(), {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.replace(/^\uFEFF/, "").trim(),
  });
}

export function parseReadingsCsv(content: string): ParsedSeries {
  const { data, meta } = readCsv(content);

  const columns = resolveColumns(meta.fields ?? [], COLUMNS, COLUMN_ALIASES);
  const readings: RawReading[] = [];
  const dropped: ParseError[] = [];

  data.forEach((row, index) => {
    // Data rows start on line 2, after the header
    const line = index + 2;
    const raw = columns.timestamp ? row[columns.timestamp] : undefined;
    const time = parseInstant(raw);

    if (time === null) {
      dropped.push(new ParseError(line, `unreadable timestamp "${raw ?? ""}"`));
      return;
    }

    readings.push({
      timestamp: formatInstant(time),
      level: columns.level ? parseNumberOrNull(row[columns.level]) : null,
      discharge: columns.discharge
        ? parseNumberOrNull(row[columns.discharge])
        : null,
    });
  });

  return { readings, dropped };
}

/**
 * Parse an export of official daily means. Each field that has a value is
 * given `OFFICIAL_DAILY_SAMPLES` samples; days without either value are left
 * out. Rows with an unreadable date are dropped.
 */
export function parseDailyMeansCsv(content: string): ParsedDailyMeans {
  const { data, meta } = readCsv(content);

  const columns = resolveColumns(meta.fields ?? [], DAILY_COLUMNS, DAILY_COLUMN_ALIASES);
  const means: DailyMean[] = [];
  const dropped: ParseError[] = [];
  let stationName: string | null = null;

  data.forEach((row, index) => {
    const line = index + 2;
    const raw = columns.date ? row[columns.date] : undefined;
    const date = parseDateOrNull(raw);

    if (date === null) {
      dropped.push(new ParseError(line, `unreadable date "${raw ?? ""}"`));
      return;
    }

    stationName ||= (columns.name ? row[columns.name]?.trim() : undefined) || null;

    const level = columns.level ? parseNumberOrNull(row[columns.level]) : null;
    const discharge = columns.discharge ? parseNumberOrNull(row[columns.discharge]) : null;
    if (level === null && discharge === null) return;

    means.push({
      date,
      mean_level: level,
      mean_discharge: discharge,
      level_samples: level === null ? 0 : OFFICIAL_DAILY_SAMPLES,
      discharge_samples: discharge === null ? 0 : OFFICIAL_DAILY_SAMPLES,
    });
  });

  return { means, stationName, dropped };
}
