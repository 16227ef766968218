import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { MetricKey, PracticeReport } from "@range-insights/shared";
import { runCalculators } from "../calculators/registry";
import type { ShotFilter } from "../calculators/dashboard";
import type { AnalyzerConfig } from "../config";
import { CLUB_STATS_COLUMNS, TREND_COLUMNS, toCsv, toJson } from "../lib/export";
import { StorageError } from "../lib/errors";
import type { ILogger } from "../lib/logger";
import { createJobLogger, withTiming } from "../lib/logger";
import { SessionRepository } from "../storage/sessionRepository";

type PracticeReportOptions = {
  config: AnalyzerConfig;
  logger?: ILogger;
  filter?: ShotFilter;
  basisMetric?: MetricKey;
  selectedMetric?: MetricKey;
  /** Write CSV/JSON exports to config.exportDir */
  exportFiles?: boolean;
};

export type PracticeReportResult = {
  report: PracticeReport;
  files: string[];
};

export async function runPracticeReport({
  config,
  logger,
  filter,
  basisMetric,
  selectedMetric,
  exportFiles = false,
}: PracticeReportOptions): Promise<PracticeReportResult> {
  const log = logger ?? createJobLogger({ job: "practice_report", minLevel: config.logLevel });
  const sessions = new SessionRepository({ sessionsDir: config.sessionsDir, logger: log });

  const table = await withTiming(log, "load_sessions", () => sessions.loadAllSessions());

  const report = runCalculators({
    table,
    filter,
    basisMetric: basisMetric ?? config.basisMetric,
    selectedMetric,
  });

  if (report.status === "no_data") {
    log.warn("no shots to report", { sessions: report.sessions.length });
    return { report, files: [] };
  }
  if (report.status === "no_efficiency") {
    log.warn("no Smash column; efficiency indicators skipped");
  }

  log.info("practice report built", {
    shots: report.shotCount,
    clubStats: report.clubStats.length,
    trends: report.trends.length,
    basisMetric: report.basisMetric,
  });

  const files = exportFiles ? await writeReportFiles(report, config.exportDir, log) : [];
  return { report, files };
}

async function writeReportFiles(report: PracticeReport, exportDir: string, log: ILogger): Promise<string[]> {
  const outputs: [string, string][] = [
    ["club_stats.csv", toCsv(report.clubStats, CLUB_STATS_COLUMNS)],
    ["trends.csv", toCsv(report.trends, TREND_COLUMNS)],
    ["report.json", toJson(report)],
  ];

  try {
    await mkdir(exportDir, { recursive: true });
    const written: string[] = [];
    for (const [name, contents] of outputs) {
      const target = path.join(exportDir, name);
      await writeFile(target, contents, "utf-8");
      written.push(target);
    }
    log.info("report exported", { exportDir, files: written.length });
    return written;
  } catch (error) {
    throw new StorageError("write", "could not export report", { exportDir }, error instanceof Error ? error : undefined);
  }
}
