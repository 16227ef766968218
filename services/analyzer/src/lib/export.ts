/**
 * CSV/JSON export of report tables
 */

import Papa from "papaparse";
import type { ClubSessionStats, ClubTrend, RoundSummary } from "@range-insights/shared";
import { round3 } from "./descriptive";

export type Cell = string | number | boolean | null;

export type ExportColumn<T> = {
  header: string;
  value: (row: T) => Cell;
};

export const CLUB_STATS_COLUMNS: ExportColumn<ClubSessionStats>[] = [
  { header: "session", value: (r) => r.sessionLabel },
  { header: "club", value: (r) => r.club },
  { header: "shots", value: (r) => r.shots },
  { header: "smash_avg", value: (r) => r.smashAvg },
  { header: "smash_std", value: (r) => r.smashStd },
  { header: "target_smash", value: (r) => r.targetSmash },
  { header: "smash_diff", value: (r) => r.smashDiff },
  { header: "consistency_index", value: (r) => r.consistencyIndex },
];

export const TREND_COLUMNS: ExportColumn<ClubTrend>[] = [
  { header: "club", value: (r) => r.club },
  { header: "smash_first", value: (r) => r.firstSmash },
  { header: "smash_last", value: (r) => r.lastSmash },
  { header: "smash_delta", value: (r) => r.deltaSmash },
  { header: "trend", value: (r) => r.trend },
];

export const ROUND_SUMMARY_COLUMNS: ExportColumn<RoundSummary>[] = [
  { header: "date", value: (r) => r.date },
  { header: "course", value: (r) => r.courseName },
  { header: "round_id", value: (r) => r.roundId },
  { header: "holes", value: (r) => r.holes },
  { header: "score", value: (r) => r.totalScore },
  { header: "par", value: (r) => r.totalPar },
  { header: "score_vs_par", value: (r) => r.scoreVsPar },
  { header: "putts", value: (r) => r.totalPutts },
];

/** Numbers rounded to 3 decimals; null as an empty cell */
export function displayCell(value: Cell): string | number | boolean {
  if (value === null) return "";
  if (typeof value === "number") return Number.isFinite(value) ? round3(value) : "";
  return value;
}

export function toCsv<T>(rows: readonly T[], columns: readonly ExportColumn<T>[]): string {
  return Papa.unparse(
    {
      fields: columns.map((c) => c.header),
      data: rows.map((row) => columns.map((c) => displayCell(c.value(row)))),
    },
    { newline: "\n" }
  );
}

export function toJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}
