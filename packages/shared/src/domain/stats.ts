/**
 * Per (session, club) efficiency summary
 */
export type ClubSessionStats = {
  sessionFile: string;
  sessionLabel: string;
  club: string;
  shots: number;
  smashAvg: number | null;
  /** Sample standard deviation; null below 2 values */
  smashStd: number | null;
  targetSmash: number;
  smashDiff: number | null;
  /** 0-100; null below 3 basis values or for a zero mean */
  consistencyIndex: number | null;
  /** Earliest shot timestamp in the group */
  capturedAt: number | null;
};

export type TrendDirection = "improving" | "declining" | "stable";

export type TrendOrder = "capturedAt" | "sessionLabel";

/**
 * First vs last session efficiency for one club. Numbers are rounded to 3
 * decimals; an end without a smash average leaves the delta null and the
 * trend stable.
 */
export type ClubTrend = {
  club: string;
  firstSmash: number | null;
  lastSmash: number | null;
  deltaSmash: number | null;
  trend: TrendDirection;
  orderedBy: TrendOrder;
};
