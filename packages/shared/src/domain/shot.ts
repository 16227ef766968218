import type { MetricKey } from "../metricKeys";

/**
 * One recorded shot from a launch monitor export.
 * Every metric is an explicit nullable field; `null` means the cell was empty
 * or not numeric.
 */
export type ShotRecord = {
  /** Source file name, the session identity */
  sessionFile: string;
  sessionLabel: string;
  club: string;
  /** Per-shot sequence id from the export's `Shot` column, kept as text */
  shot: string | null;
  /** Capture time (epoch ms) from the export's `Date` column */
  capturedAt: number | null;
} & Record<MetricKey, number | null>;

/** Optional columns whose presence is tracked per table */
export type ShotColumn = MetricKey | "shot" | "capturedAt";

/**
 * In-memory shot table. `columns` lists the optional columns present in at
 * least one source file; a column can be present while every cell is null.
 */
export type ShotTable = {
  columns: ShotColumn[];
  rows: ShotRecord[];
};

export type SessionRef = {
  sessionFile: string;
  sessionLabel: string;
};

export function emptyShotTable(): ShotTable {
  return { columns: [], rows: [] };
}
