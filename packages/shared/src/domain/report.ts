import type { MetricKey } from "../metricKeys";
import type { SessionRef } from "./shot";
import type { ClubSessionStats, ClubTrend } from "./stats";

export type MetricSeriesPoint = {
  sessionFile: string;
  sessionLabel: string;
  club: string;
  value: number | null;
};

export type DispersionPoint = {
  sessionLabel: string;
  club: string;
  shot: string | null;
  curveDistYds: number;
  carryYds: number;
  label: string;
};

/** Filtered shots as listed in the raw data view; metric values rounded to 3 decimals */
export type RawShotRow = {
  sessionLabel: string;
  club: string;
  shot: string | null;
  values: Partial<Record<MetricKey, number | null>>;
};

export type RawShotTable = {
  withShotIds: boolean;
  metrics: MetricKey[];
  rows: RawShotRow[];
};

export type ReportStatus = "ok" | "no_data" | "no_efficiency";

export type PracticeReport = {
  status: ReportStatus;
  sessions: SessionRef[];
  clubs: string[];
  metrics: MetricKey[];
  selectedMetric: MetricKey | null;
  basisMetric: MetricKey;
  clubStats: ClubSessionStats[];
  trends: ClubTrend[];
  series: MetricSeriesPoint[];
  dispersion: DispersionPoint[];
  raw: RawShotTable;
  shotCount: number;
};
