import { DEFAULT_BASIS_METRIC, EFFICIENCY_METRIC } from "@range-insights/shared";
import type { MetricKey, PracticeReport, ShotTable } from "@range-insights/shared";
import { buildClubSessionStats, resolveBasisMetric } from "./clubSessionStats";
import { buildClubTrends } from "./clubTrend";
import {
  availableMetrics,
  buildDispersion,
  buildMetricSeries,
  buildRawTable,
  defaultMetric,
  filterShots,
  listClubs,
  listSessions,
} from "./dashboard";
import type { ShotFilter } from "./dashboard";

export type CalculatorContext = {
  table: ShotTable;
  filter?: ShotFilter;
  /** Metric the consistency index is computed on */
  basisMetric?: MetricKey;
  /** Metric for the chart series; defaults to carry when present */
  selectedMetric?: MetricKey;
};

/**
 * Run every practice calculator over one shot table. Pure and synchronous:
 * the same table always yields the same report.
 */
export function runCalculators(ctx: CalculatorContext): PracticeReport {
  // pickers list everything loaded; the rest works on the filtered rows
  const sessions = listSessions(ctx.table);
  const clubs = listClubs(ctx.table);
  const metrics = availableMetrics(ctx.table);

  const filtered = filterShots(ctx.table, ctx.filter);
  const basisMetric = resolveBasisMetric(filtered, ctx.basisMetric ?? DEFAULT_BASIS_METRIC);
  const selectedMetric =
    ctx.selectedMetric && metrics.includes(ctx.selectedMetric) ? ctx.selectedMetric : defaultMetric(metrics);

  const base: PracticeReport = {
    status: "ok",
    sessions,
    clubs,
    metrics,
    selectedMetric,
    basisMetric,
    clubStats: [],
    trends: [],
    series: [],
    dispersion: [],
    raw: buildRawTable(filtered),
    shotCount: filtered.rows.length,
  };

  if (filtered.rows.length === 0) {
    return { ...base, status: "no_data" };
  }

  const clubStats = buildClubSessionStats(filtered, basisMetric);

  return {
    ...base,
    status: filtered.columns.includes(EFFICIENCY_METRIC) ? "ok" : "no_efficiency",
    clubStats,
    trends: buildClubTrends(clubStats),
    series: selectedMetric ? buildMetricSeries(filtered, selectedMetric) : [],
    dispersion: buildDispersion(filtered),
  };
}
