/**
 * Table shaping for the practice dashboard: pickers, filters, chart series.
 */

import { DEFAULT_BASIS_METRIC, METRIC_KEYS } from "@range-insights/shared";
import type {
  DispersionPoint,
  MetricKey,
  MetricSeriesPoint,
  RawShotRow,
  RawShotTable,
  SessionRef,
  ShotTable,
} from "@range-insights/shared";
import { compareText, finiteValues, mean, round3 } from "../lib/descriptive";
import { sortClubs } from "./clubClassifier";
import { groupShots } from "./clubSessionStats";

export type ShotFilter = {
  /** Session files to keep; omitted keeps all */
  sessions?: readonly string[];
  clubs?: readonly string[];
};

export function availableMetrics(table: ShotTable): MetricKey[] {
  return METRIC_KEYS.filter((key) => table.columns.includes(key));
}

export function defaultMetric(metrics: readonly MetricKey[]): MetricKey | null {
  if (metrics.includes(DEFAULT_BASIS_METRIC)) return DEFAULT_BASIS_METRIC;
  return metrics[0] ?? null;
}

/**
 * Distinct sessions sorted by label
 */
export function listSessions(table: ShotTable): SessionRef[] {
  const seen = new Map<string, SessionRef>();
  for (const row of table.rows) {
    const key = JSON.stringify([row.sessionFile, row.sessionLabel]);
    if (!seen.has(key)) seen.set(key, { sessionFile: row.sessionFile, sessionLabel: row.sessionLabel });
  }
  return Array.from(seen.values()).sort((a, b) => compareText(a.sessionLabel, b.sessionLabel));
}

export function listClubs(table: ShotTable): string[] {
  return sortClubs(table.rows.map((row) => row.club));
}

export function filterShots(table: ShotTable, filter: ShotFilter = {}): ShotTable {
  const sessions = filter.sessions ? new Set(filter.sessions) : null;
  const clubs = filter.clubs ? new Set(filter.clubs) : null;

  return {
    columns: table.columns.slice(),
    rows: table.rows.filter(
      (row) => (!sessions || sessions.has(row.sessionFile)) && (!clubs || clubs.has(row.club))
    ),
  };
}

/**
 * Mean of one metric per session and club, for line and bar charts
 */
export function buildMetricSeries(table: ShotTable, metric: MetricKey): MetricSeriesPoint[] {
  if (!table.columns.includes(metric)) return [];

  return groupShots(table.rows).map((group) => ({
    sessionFile: group.sessionFile,
    sessionLabel: group.sessionLabel,
    club: group.club,
    value: mean(finiteValues(group.rows.map((row) => row[metric]))),
  }));
}

/**
 * Lateral curve vs carry per shot
 */
export function buildDispersion(table: ShotTable): DispersionPoint[] {
  if (!table.columns.includes("curveDistYds") || !table.columns.includes("carryYds")) return [];

  const withShotIds = table.columns.includes("shot");
  const points: DispersionPoint[] = [];

  for (const row of table.rows) {
    if (row.curveDistYds === null || row.carryYds === null) continue;
    const shotPart = withShotIds ? `<br>Shot: ${row.shot ?? ""}` : "";
    points.push({
      sessionLabel: row.sessionLabel,
      club: row.club,
      shot: row.shot,
      curveDistYds: row.curveDistYds,
      carryYds: row.carryYds,
      label: `Session: ${row.sessionLabel}<br>Club: ${row.club}${shotPart}`,
    });
  }

  return points;
}

export function buildRawTable(table: ShotTable): RawShotTable {
  const metrics = availableMetrics(table);
  const withShotIds = table.columns.includes("shot");

  const rows = table.rows.map((row): RawShotRow => {
    const values: RawShotRow["values"] = {};
    for (const key of metrics) {
      const value = row[key];
      values[key] = value === null ? null : round3(value);
    }
    return {
      sessionLabel: row.sessionLabel,
      club: row.club,
      shot: withShotIds ? row.shot : null,
      values,
    };
  });

  return { withShotIds, metrics, rows };
}
