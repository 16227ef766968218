import { isGolfActivity, normalizeActivityRound, parseActivity } from "../activity/scorecard";
import type { GolfActivity } from "../activity/scorecard";
import type { AnalyzerConfig } from "../config";
import { PayloadError } from "../lib/errors";
import type { ILogger } from "../lib/logger";
import { createJobLogger } from "../lib/logger";
import { RoundRepository } from "../storage/roundRepository";

/**
 * Store the golf rounds found in already-fetched activity payloads.
 * Returns the written file paths.
 */
export async function importActivityRounds(
  activities: readonly unknown[],
  { config, logger }: { config: AnalyzerConfig; logger?: ILogger }
): Promise<string[]> {
  const log = logger ?? createJobLogger({ job: "import_rounds", minLevel: config.logLevel });
  const rounds = new RoundRepository({ roundsDir: config.roundsDir, logger: log });

  log.info("round import start", { activities: activities.length });
  const saved: string[] = [];

  for (const [index, payload] of activities.entries()) {
    let activity: GolfActivity;
    try {
      activity = parseActivity(payload);
    } catch (error) {
      if (!(error instanceof PayloadError)) throw error;
      log.warn("activity skipped: unexpected shape", { index, issues: error.context.issues });
      continue;
    }

    if (!isGolfActivity(activity)) {
      log.debug("activity skipped: not golf", { index });
      continue;
    }

    const round = normalizeActivityRound(activity, log);
    if (!round) {
      log.warn("round without a parseable scorecard", { index });
      continue;
    }

    saved.push(await rounds.saveRound(round.holes, round.meta));
  }

  log.info("round import complete", { saved: saved.length });
  return saved;
}
