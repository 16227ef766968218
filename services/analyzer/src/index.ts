/**
 * Library exports for the analyzer
 */

// Metrics engine
export { parseSessionLabel } from "./calculators/sessionLabel";
export { clubTargetSmash, clubSortRank, sortClubs, TARGET_SMASH } from "./calculators/clubClassifier";
export { calcConsistency, MIN_CONSISTENCY_SAMPLES } from "./calculators/consistency";
export { buildClubSessionStats, groupShots, resolveBasisMetric, type ShotGroup } from "./calculators/clubSessionStats";
export { buildClubTrends, classifyTrend, TREND_DEADZONE } from "./calculators/clubTrend";
export { summarizeRounds } from "./calculators/roundSummary";
export {
  availableMetrics,
  buildDispersion,
  buildMetricSeries,
  buildRawTable,
  defaultMetric,
  filterShots,
  listClubs,
  listSessions,
  type ShotFilter,
} from "./calculators/dashboard";
export { runCalculators, type CalculatorContext } from "./calculators/registry";

// Ingestion and storage
export { parseShotCsv, parseCsvRows, concatShotTables } from "./lib/shotCsv";
export { SessionRepository, type UploadedFile } from "./storage/sessionRepository";
export { RoundRepository, roundFileName, type RoundMeta } from "./storage/roundRepository";
export {
  parseActivity,
  isGolfActivity,
  extractRoundHoles,
  normalizeActivityRound,
  type GolfActivity,
} from "./activity/scorecard";

// Jobs
export { runPracticeReport } from "./jobs/runPracticeReport";
export { runRoundReport } from "./jobs/runRoundReport";
export { importActivityRounds } from "./jobs/importActivityRounds";

// Ambient
export { loadConfig, buildConfig, type AnalyzerConfig } from "./config";
export { Logger, createJobLogger, type ILogger, type LogLevel } from "./lib/logger";
export * from "./lib/errors";
export { toCsv, CLUB_STATS_COLUMNS, TREND_COLUMNS, ROUND_SUMMARY_COLUMNS } from "./lib/export";
