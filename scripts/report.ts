/**
 * Practice and round reports from the command line
 * Usage:
 *   tsx scripts/report.ts practice [--export] [--club <name>]... [--session <file>]...
 *   tsx scripts/report.ts import-sessions <file.csv>...
 *   tsx scripts/report.ts rounds
 *   tsx scripts/report.ts import-rounds <activities.json>
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import {
  CLUB_STATS_COLUMNS,
  ROUND_SUMMARY_COLUMNS,
  SessionRepository,
  TREND_COLUMNS,
  importActivityRounds,
  loadConfig,
  runPracticeReport,
  runRoundReport,
  toCsv,
} from "@range-insights/analyzer";

function collectFlag(args: string[], flag: string): string[] | undefined {
  const values: string[] = [];
  args.forEach((arg, i) => {
    if (arg === flag && args[i + 1]) values.push(args[i + 1]);
  });
  return values.length > 0 ? values : undefined;
}

async function main() {
  const [command, ...args] = process.argv.slice(2);
  const config = loadConfig();

  switch (command) {
    case "practice": {
      const { report, files } = await runPracticeReport({
        config,
        filter: { clubs: collectFlag(args, "--club"), sessions: collectFlag(args, "--session") },
        exportFiles: args.includes("--export"),
      });
      if (report.status === "no_data") {
        console.log("No sessions stored yet. Import at least one CSV.");
        return;
      }
      if (report.status === "no_efficiency") {
        console.log("No 'Smash' column found; efficiency indicators need it.");
      } else {
        console.log("\n=== Efficiency and consistency by club/session ===");
        console.log(toCsv(report.clubStats, CLUB_STATS_COLUMNS));
        console.log("\n=== Smash trend by club (first vs last session) ===");
        console.log(
          report.trends.length > 0
            ? toCsv(report.trends, TREND_COLUMNS)
            : "More than one session per club is needed for a trend."
        );
      }
      files.forEach((file) => console.log(`Exported: ${file}`));
      return;
    }
    case "import-sessions": {
      if (args.length === 0) throw new Error("Usage: tsx scripts/report.ts import-sessions <file.csv>...");
      const files = await Promise.all(
        args.map(async (source) => ({ name: path.basename(source), data: await readFile(source) }))
      );
      const saved = await new SessionRepository({ sessionsDir: config.sessionsDir }).saveUploadedSessions(files);
      saved.forEach((file) => console.log(`Imported: ${file}`));
      return;
    }
    case "rounds": {
      const rounds = await runRoundReport({ config });
      console.log(rounds.length > 0 ? toCsv(rounds, ROUND_SUMMARY_COLUMNS) : "No rounds stored yet.");
      return;
    }
    case "import-rounds": {
      const source = args[0];
      if (!source) throw new Error("Usage: tsx scripts/report.ts import-rounds <activities.json>");
      const payload: unknown = JSON.parse(await readFile(source, "utf-8"));
      const activities = Array.isArray(payload) ? payload : [payload];
      const saved = await importActivityRounds(activities, { config });
      console.log(`Saved ${saved.length} round(s)`);
      return;
    }
    default:
      console.error("Usage: tsx scripts/report.ts <practice|import-sessions|rounds|import-rounds> [options]");
      process.exitCode = 1;
  }
}

main().catch((e) => {
  console.error("Error:", e);
  process.exit(1);
});
