/**
 * First vs last session smash factor per club
 */

import type { ClubSessionStats, ClubTrend, TrendDirection, TrendOrder } from "@range-insights/shared";
import { compareText, round3 } from "../lib/descriptive";

// Changes inside +/- this band count as noise
export const TREND_DEADZONE = 0.01;

export function classifyTrend(delta: number | null): TrendDirection {
  if (delta === null) return "stable";
  if (delta > TREND_DEADZONE) return "improving";
  if (delta < -TREND_DEADZONE) return "declining";
  return "stable";
}

/**
 * Sessions are ordered by capture time when every row has one, otherwise by
 * label text. Label order is not chronological for day-name labels. Equal
 * capture times fall back to label order.
 */
function orderSessions(rows: readonly ClubSessionStats[]): { ordered: ClubSessionStats[]; orderedBy: TrendOrder } {
  const timed = rows.every((row) => row.capturedAt !== null);
  const ordered = rows.slice().sort((a, b) => {
    const byTime = timed && a.capturedAt !== null && b.capturedAt !== null ? a.capturedAt - b.capturedAt : 0;
    return byTime || compareText(a.sessionLabel, b.sessionLabel);
  });
  return { ordered, orderedBy: timed ? "capturedAt" : "sessionLabel" };
}

const rounded = (value: number | null) => (value === null ? null : round3(value));

export function buildClubTrends(stats: readonly ClubSessionStats[]): ClubTrend[] {
  if (stats.length === 0) return [];

  const byClub = new Map<string, ClubSessionStats[]>();
  for (const row of stats) {
    const bucket = byClub.get(row.club);
    if (bucket) {
      bucket.push(row);
    } else {
      byClub.set(row.club, [row]);
    }
  }

  const trends: ClubTrend[] = [];

  for (const [club, rows] of byClub) {
    if (rows.length < 2) continue;

    const { ordered, orderedBy } = orderSessions(rows);
    const first = ordered[0].smashAvg;
    const last = ordered[ordered.length - 1].smashAvg;
    const delta = first === null || last === null ? null : last - first;

    trends.push({
      club,
      firstSmash: rounded(first),
      lastSmash: rounded(last),
      deltaSmash: rounded(delta),
      trend: classifyTrend(delta),
      orderedBy,
    });
  }

  return trends;
}
