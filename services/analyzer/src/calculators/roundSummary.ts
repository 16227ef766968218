import type { HoleRecord, RoundSummary } from "@range-insights/shared";
import { compareText, sum } from "../lib/descriptive";

/**
 * Scorecard totals per round. Missing par/score/putts cells are skipped.
 */
export function summarizeRounds(holes: readonly HoleRecord[]): RoundSummary[] {
  const rounds = new Map<string, HoleRecord[]>();
  for (const hole of holes) {
    const bucket = rounds.get(hole.roundId);
    if (bucket) {
      bucket.push(hole);
    } else {
      rounds.set(hole.roundId, [hole]);
    }
  }

  const summaries: RoundSummary[] = [];
  for (const [roundId, roundHoles] of rounds) {
    const totalScore = sum(roundHoles.map((h) => h.score));
    const totalPar = sum(roundHoles.map((h) => h.par));
    summaries.push({
      roundId,
      date: roundHoles[0].date,
      courseName: roundHoles.find((h) => h.courseName !== null)?.courseName ?? null,
      holes: roundHoles.length,
      totalScore,
      totalPar,
      totalPutts: sum(roundHoles.map((h) => h.putts)),
      scoreVsPar: totalScore - totalPar,
    });
  }

  return summaries.sort((a, b) => compareText(a.date, b.date) || compareText(a.roundId, b.roundId));
}
