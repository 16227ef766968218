/**
 * Activity scorecard normalization
 *
 * Turns an already-fetched activity payload from the tracking service into
 * hole rows. Fetching and auth live outside this package.
 */

import { z } from "zod";
import type { HoleRecord } from "@range-insights/shared";
import { PayloadError } from "../lib/errors";
import type { ILogger } from "../lib/logger";
import { defaultLogger } from "../lib/logger";
import type { RoundMeta } from "../storage/roundRepository";

const optionalNumber = z.number().nullish();
const optionalBoolean = z.boolean().nullish();
const optionalText = z.string().nullish();

export const ScorecardHoleSchema = z
  .object({
    holeNumber: optionalNumber,
    hole: optionalNumber,
    par: optionalNumber,
    score: optionalNumber,
    putts: optionalNumber,
    fairwayHit: optionalBoolean,
    greenInRegulation: optionalBoolean,
    gir: optionalBoolean,
    driveDistance: optionalNumber,
    teeShotDistance: optionalNumber,
  })
  .passthrough();

export const ScorecardSchema = z
  .object({
    holes: z.array(ScorecardHoleSchema).nullish(),
    golfHoles: z.array(ScorecardHoleSchema).nullish(),
  })
  .passthrough();

export const ActivityTypeSchema = z
  .object({
    typeKey: optionalText,
    typeId: optionalNumber,
  })
  .passthrough();

export const GolfActivitySchema = z
  .object({
    activityId: z.union([z.number(), z.string()]).nullish(),
    activityIdLong: z.union([z.number(), z.string()]).nullish(),
    activityName: optionalText,
    locationName: optionalText,
    startTimeLocal: optionalText,
    startTimeGMT: optionalText,
    activityType: ActivityTypeSchema.nullish(),
    golfScorecard: ScorecardSchema.nullish(),
    golfGame: ScorecardSchema.nullish(),
  })
  .passthrough();

export type ScorecardHole = z.infer<typeof ScorecardHoleSchema>;
export type GolfActivity = z.infer<typeof GolfActivitySchema>;

export type NormalizedRound = {
  meta: RoundMeta;
  holes: HoleRecord[];
};

// first non-empty value, the way the service fills alternative field names
function firstPresent<T>(...values: (T | null | undefined)[]): T | null {
  for (const value of values) {
    if (value !== null && value !== undefined && value !== "") return value;
  }
  return null;
}

export function parseActivity(payload: unknown): GolfActivity {
  const result = GolfActivitySchema.safeParse(payload);
  if (!result.success) {
    throw new PayloadError("unexpected activity shape", {
      issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return result.data;
}

export function isGolfActivity(activity: GolfActivity): boolean {
  const typeKey = activity.activityType?.typeKey;
  return typeof typeKey === "string" && typeKey.toLowerCase() === "golf";
}

type HoleFields = Omit<HoleRecord, "roundId" | "date" | "courseName">;

type Scorecard = z.infer<typeof ScorecardSchema>;

function scorecardHoles(scorecard: Scorecard): ScorecardHole[] {
  return scorecard.holes?.length ? scorecard.holes : scorecard.golfHoles ?? [];
}

export function extractRoundHoles(activity: GolfActivity, logger: ILogger = defaultLogger): HoleFields[] | null {
  const scorecards = [activity.golfScorecard, activity.golfGame].filter(
    (card): card is Scorecard => card !== null && card !== undefined
  );
  if (scorecards.length === 0) {
    logger.warn("activity has neither golfScorecard nor golfGame");
    return null;
  }

  // an empty golfScorecard defers to golfGame
  const holes = scorecards.map(scorecardHoles).find((list) => list.length > 0) ?? [];
  if (holes.length === 0) {
    logger.warn("scorecard has no holes");
    return null;
  }

  const rows = holes.map((hole: ScorecardHole) => ({
    hole: firstPresent(hole.holeNumber, hole.hole),
    par: hole.par ?? null,
    score: hole.score ?? null,
    putts: hole.putts ?? null,
    fairwayHit: hole.fairwayHit ?? null,
    greenInRegulation: firstPresent(hole.greenInRegulation, hole.gir),
    driveDistance: firstPresent(hole.driveDistance, hole.teeShotDistance),
  }));

  logger.info("scorecard parsed", { holes: rows.length });
  return rows;
}

export function roundMetaFor(activity: GolfActivity): RoundMeta {
  const roundId = String(firstPresent(activity.activityId, activity.activityIdLong) ?? "unknown");
  const startTime = firstPresent(activity.startTimeLocal, activity.startTimeGMT);
  return {
    roundId,
    date: startTime ? startTime.slice(0, 10) : "unknown",
    courseName: firstPresent(activity.locationName, activity.activityName),
  };
}

export function normalizeActivityRound(activity: GolfActivity, logger: ILogger = defaultLogger): NormalizedRound | null {
  const meta = roundMetaFor(activity);
  const holes = extractRoundHoles(activity, logger.child({ roundId: meta.roundId }));
  if (!holes) return null;

  return {
    meta,
    holes: holes.map((hole) => ({
      ...hole,
      roundId: meta.roundId,
      date: meta.date,
      courseName: meta.courseName ?? null,
    })),
  };
}
