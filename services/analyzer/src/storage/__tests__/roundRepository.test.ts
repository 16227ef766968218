import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { RoundRepository, roundFileName } from "../roundRepository";
import { createHole, createMockLogger } from "../../lib/testHelpers";

describe("roundFileName", () => {
  it("should combine date, course slug and round id", () => {
    expect(roundFileName({ roundId: "42", date: "2024-05-04", courseName: "Test Links GC" })).toBe(
      "2024-05-04_test-links-gc_42.csv"
    );
    expect(roundFileName({ roundId: "42", date: "2024-05-04" })).toBe("2024-05-04_42.csv");
  });
});

describe("RoundRepository", () => {
  let dir: string;
  let repo: RoundRepository;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "rounds-"));
    repo = new RoundRepository({ roundsDir: dir, logger: createMockLogger() });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should write one CSV per round", async () => {
    const target = await repo.saveRound(
      [createHole({ hole: 1, putts: null, fairwayHit: false, driveDistance: null })],
      { roundId: "42", date: "2024-05-04", courseName: "Test Links" }
    );

    expect(path.basename(target)).toBe("2024-05-04_test-links_42.csv");
    expect(await readFile(target, "utf-8")).toBe(
      "hole,par,score,putts,fairway,green,drive_distance,round_id,date,course_name\n" +
        "1,4,4,,false,true,,42,2024-05-04,Test Links\n"
    );
  });

  it("should read back what it saved", async () => {
    const holes = [
      createHole({ roundId: "42", hole: 1, par: 4, score: 5, greenInRegulation: false }),
      createHole({ roundId: "42", hole: 2, par: 3, score: 3, fairwayHit: null, putts: 1 }),
    ];
    await repo.saveRound(holes, { roundId: "42", date: "2024-05-04", courseName: "Test Links" });

    const loaded = await repo.loadAllRounds();

    expect(loaded).toEqual([
      {
        roundFile: "2024-05-04_test-links_42.csv",
        roundId: "42",
        date: "2024-05-04",
        courseName: "Test Links",
        hole: 1,
        par: 4,
        score: 5,
        putts: 2,
        fairwayHit: true,
        greenInRegulation: false,
        driveDistance: 240,
      },
      {
        roundFile: "2024-05-04_test-links_42.csv",
        roundId: "42",
        date: "2024-05-04",
        courseName: "Test Links",
        hole: 2,
        par: 3,
        score: 3,
        putts: 1,
        fairwayHit: null,
        greenInRegulation: true,
        driveDistance: 240,
      },
    ]);
  });

  it("should return nothing for an empty directory", async () => {
    expect(await repo.loadAllRounds()).toEqual([]);
  });
});
