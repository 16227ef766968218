import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { runPracticeReport } from "../runPracticeReport";
import { buildConfig } from "../../config";
import type { AnalyzerConfig } from "../../config";
import { createMockLogger } from "../../lib/testHelpers";

describe("runPracticeReport", () => {
  let dir: string;
  let config: AnalyzerConfig;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "practice-"));
    config = buildConfig({ dataDir: dir });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeSession(name: string, text: string) {
    await mkdir(config.sessionsDir, { recursive: true });
    await writeFile(path.join(config.sessionsDir, name), text);
  }

  it("should report no_data when nothing is stored", async () => {
    const logger = createMockLogger();
    const { report, files } = await runPracticeReport({ config, logger, exportFiles: true });

    expect(report.status).toBe("no_data");
    expect(files).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith("no shots to report", { sessions: 0 });
  });

  it("should build and export the report", async () => {
    await writeSession("sunday__09_00_am.csv", "club,Smash,Carry (yds)\n7 Iron,1.30,150\n7 Iron,1.30,160\n");
    await writeSession("monday__06_30_pm.csv", "club;Smash;Carry (yds)\n7 Iron;1.35;155\n");

    const { report, files } = await runPracticeReport({ config, logger: createMockLogger(), exportFiles: true });

    expect(report.status).toBe("ok");
    expect(report.clubStats.map((s) => [s.sessionLabel, s.shots])).toEqual([
      ["Monday 06:30 PM", 1],
      ["Sunday 09:00 AM", 2],
    ]);
    // label order puts Monday first
    expect(report.trends).toEqual([
      {
        club: "7 Iron",
        firstSmash: 1.35,
        lastSmash: 1.3,
        deltaSmash: -0.05,
        trend: "declining",
        orderedBy: "sessionLabel",
      },
    ]);

    expect(files.map((file) => path.basename(file))).toEqual(["club_stats.csv", "trends.csv", "report.json"]);
    expect(await readFile(path.join(config.exportDir, "trends.csv"), "utf-8")).toBe(
      "club,smash_first,smash_last,smash_delta,trend\n7 Iron,1.35,1.3,-0.05,declining"
    );
    const json = JSON.parse(await readFile(path.join(config.exportDir, "report.json"), "utf-8"));
    expect(json.shotCount).toBe(3);
  });

  it("should apply club filters and skip exports by default", async () => {
    await writeSession("s1.csv", "club,Smash\nDriver,1.44\n7 Iron,1.31\n");

    const { report, files } = await runPracticeReport({
      config,
      logger: createMockLogger(),
      filter: { clubs: ["Driver"] },
    });

    expect(report.shotCount).toBe(1);
    expect(report.clubs).toEqual(["Driver", "7 Iron"]);
    expect(files).toEqual([]);
  });
});
