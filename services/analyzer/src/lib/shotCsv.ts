/**
 * Launch monitor CSV -> ShotTable
 */

import Papa from "papaparse";
import { METRIC_KEYS, metricKeys } from "@range-insights/shared";
import type { MetricKey, ShotColumn, ShotRecord, ShotTable } from "@range-insights/shared";
import { MissingFieldError, ValidationError } from "./errors";

type ParsedRow = Record<string, unknown>;

export const CLUB_COLUMN = "club";
export const SHOT_COLUMN = "Shot";
export const DATE_COLUMNS = ["Date", "Timestamp"] as const;

export function toNum(v: unknown): number | null {
  if (v === null || v === undefined) return null;
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  const s = String(v).trim();
  if (!s) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

/** Trimmed text; blank cells are null */
export function toText(v: unknown): string | null {
  if (v === null || v === undefined) return null;
  const s = String(v).trim();
  return s ? s : null;
}

export function toTimestamp(v: unknown): number | null {
  if (v === null || v === undefined) return null;
  const s = String(v).trim();
  if (!s) return null;
  const ts = Date.parse(s);
  return Number.isFinite(ts) ? ts : null;
}

function parseWith(text: string, delimiter: "," | ";") {
  return Papa.parse<ParsedRow>(text, {
    header: true,
    delimiter,
    skipEmptyLines: true,
    transformHeader: (header: string) => header.trim(),
  });
}

/**
 * Parse CSV text with a comma, retrying with a semicolon when the comma pass
 * fails or finds a single column.
 */
export function parseCsvRows(text: string): { fields: string[]; rows: ParsedRow[] } {
  let parsed = parseWith(text, ",");
  const commaFields = parsed.meta.fields ?? [];
  if (parsed.errors.length > 0 || commaFields.length <= 1) {
    const retry = parseWith(text, ";");
    if ((retry.meta.fields ?? []).length > commaFields.length) {
      parsed = retry;
    }
  }

  const fields = parsed.meta.fields ?? [];
  if (fields.length === 0) {
    throw new ValidationError("CSV has no header row");
  }

  const rows = parsed.data.filter((row) => row && Object.keys(row).length > 0);
  return { fields, rows };
}

/**
 * Build a shot table for one session file. Throws MissingFieldError when the
 * file has no `club` column.
 */
export function parseShotCsv(text: string, session: { sessionFile: string; sessionLabel: string }): ShotTable {
  const { fields, rows } = parseCsvRows(text);

  if (!fields.includes(CLUB_COLUMN)) {
    throw new MissingFieldError(CLUB_COLUMN, { sessionFile: session.sessionFile });
  }

  const dateColumn = DATE_COLUMNS.find((column) => fields.includes(column));

  const columns: ShotColumn[] = METRIC_KEYS.filter((key) => fields.includes(metricKeys[key]));
  if (fields.includes(SHOT_COLUMN)) columns.push("shot");
  if (dateColumn) columns.push("capturedAt");

  const records = rows.map((row): ShotRecord => {
    const metric = (key: MetricKey) => toNum(row[metricKeys[key]]);
    return {
      sessionFile: session.sessionFile,
      sessionLabel: session.sessionLabel,
      club: String(row[CLUB_COLUMN] ?? ""),
      shot: toText(row[SHOT_COLUMN]),
      capturedAt: dateColumn ? toTimestamp(row[dateColumn]) : null,
      ballSpeedMph: metric("ballSpeedMph"),
      clubSpeedMph: metric("clubSpeedMph"),
      smash: metric("smash"),
      carryYds: metric("carryYds"),
      totalYds: metric("totalYds"),
      rollYds: metric("rollYds"),
      spinRpm: metric("spinRpm"),
      heightFt: metric("heightFt"),
      flightTimeS: metric("flightTimeS"),
      aoaDeg: metric("aoaDeg"),
      spinLoftDeg: metric("spinLoftDeg"),
      swingPlaneDeg: metric("swingPlaneDeg"),
      curveDistYds: metric("curveDistYds"),
    };
  });

  return { columns, rows: records };
}

/**
 * Concatenate tables; the column set is the union in first-seen order.
 */
export function concatShotTables(tables: readonly ShotTable[]): ShotTable {
  const columns: ShotColumn[] = [];
  for (const table of tables) {
    for (const column of table.columns) {
      if (!columns.includes(column)) columns.push(column);
    }
  }
  return { columns, rows: tables.flatMap((table) => table.rows) };
}
