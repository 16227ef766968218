/**
 * Smash factor summary per session and club
 */

import { DEFAULT_BASIS_METRIC, EFFICIENCY_METRIC } from "@range-insights/shared";
import type { ClubSessionStats, MetricKey, ShotRecord, ShotTable } from "@range-insights/shared";
import { compareText, finiteValues, mean, sampleStd } from "../lib/descriptive";
import { clubTargetSmash } from "./clubClassifier";
import { calcConsistency } from "./consistency";

export type ShotGroup = {
  sessionFile: string;
  sessionLabel: string;
  club: string;
  rows: ShotRecord[];
};

/**
 * Partition rows by (session file, session label, club), ordered by key.
 */
export function groupShots(rows: readonly ShotRecord[]): ShotGroup[] {
  const groups = new Map<string, ShotGroup>();

  for (const row of rows) {
    const key = JSON.stringify([row.sessionFile, row.sessionLabel, row.club]);
    let group = groups.get(key);
    if (!group) {
      group = { sessionFile: row.sessionFile, sessionLabel: row.sessionLabel, club: row.club, rows: [] };
      groups.set(key, group);
    }
    group.rows.push(row);
  }

  return Array.from(groups.values()).sort(
    (a, b) =>
      compareText(a.sessionFile, b.sessionFile) ||
      compareText(a.sessionLabel, b.sessionLabel) ||
      compareText(a.club, b.club)
  );
}

/**
 * Basis metric for the consistency index; falls back to smash when the
 * requested column is not in the table.
 */
export function resolveBasisMetric(table: ShotTable, basisMetric: MetricKey = DEFAULT_BASIS_METRIC): MetricKey {
  return table.columns.includes(basisMetric) ? basisMetric : EFFICIENCY_METRIC;
}

export function buildClubSessionStats(
  table: ShotTable,
  basisMetric: MetricKey = DEFAULT_BASIS_METRIC
): ClubSessionStats[] {
  if (!table.columns.includes(EFFICIENCY_METRIC)) {
    return [];
  }

  const basis = resolveBasisMetric(table, basisMetric);
  const hasShotIds = table.columns.includes("shot");

  return groupShots(table.rows).map((group) => {
    const smash = finiteValues(group.rows.map((row) => row.smash));
    // any non-blank id counts, numeric or not
    const shots = hasShotIds ? group.rows.filter((row) => row.shot !== null).length : smash.length;

    const smashAvg = mean(smash);
    const targetSmash = clubTargetSmash(group.club);
    const timestamps = finiteValues(group.rows.map((row) => row.capturedAt));

    return {
      sessionFile: group.sessionFile,
      sessionLabel: group.sessionLabel,
      club: group.club,
      shots,
      smashAvg,
      smashStd: sampleStd(smash),
      targetSmash,
      smashDiff: smashAvg === null ? null : smashAvg - targetSmash,
      consistencyIndex: calcConsistency(group.rows.map((row) => row[basis])),
      capturedAt: timestamps.length > 0 ? Math.min(...timestamps) : null,
    };
  });
}
