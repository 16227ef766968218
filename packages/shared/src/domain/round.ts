/**
 * One played hole from a normalized scorecard
 */
export type HoleRecord = {
  roundId: string;
  /** YYYY-MM-DD, or "unknown" */
  date: string;
  courseName: string | null;
  hole: number | null;
  par: number | null;
  score: number | null;
  putts: number | null;
  fairwayHit: boolean | null;
  greenInRegulation: boolean | null;
  driveDistance: number | null;
};

export type RoundSummary = {
  roundId: string;
  date: string;
  courseName: string | null;
  holes: number;
  totalScore: number;
  totalPar: number;
  totalPutts: number;
  scoreVsPar: number;
};
