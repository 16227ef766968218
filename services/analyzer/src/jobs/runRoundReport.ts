import type { RoundSummary } from "@range-insights/shared";
import { summarizeRounds } from "../calculators/roundSummary";
import type { AnalyzerConfig } from "../config";
import type { ILogger } from "../lib/logger";
import { createJobLogger } from "../lib/logger";
import { RoundRepository } from "../storage/roundRepository";

export async function runRoundReport({
  config,
  logger,
}: {
  config: AnalyzerConfig;
  logger?: ILogger;
}): Promise<RoundSummary[]> {
  const log = logger ?? createJobLogger({ job: "round_report", minLevel: config.logLevel });
  const holes = await new RoundRepository({ roundsDir: config.roundsDir, logger: log }).loadAllRounds();

  if (holes.length === 0) {
    log.warn("no rounds stored");
    return [];
  }

  const summaries = summarizeRounds(holes);
  log.info("round report built", { rounds: summaries.length });
  return summaries;
}
