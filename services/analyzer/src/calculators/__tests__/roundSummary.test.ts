import { describe, it, expect } from "vitest";
import { summarizeRounds } from "../roundSummary";
import { createHole } from "../../lib/testHelpers";

describe("summarizeRounds", () => {
  it("should total score, par and putts per round", () => {
    const holes = [
      createHole({ roundId: "r2", date: "2024-06-01", hole: 1, par: 4, score: 5, putts: 2 }),
      createHole({ roundId: "r2", date: "2024-06-01", hole: 2, par: 3, score: 3, putts: 1 }),
      createHole({ roundId: "r1", date: "2024-05-20", hole: 1, par: 5, score: 7, putts: 3, courseName: null }),
      createHole({ roundId: "r1", date: "2024-05-20", hole: 2, par: 4, score: 4, putts: null, courseName: "Old Course" }),
    ];

    expect(summarizeRounds(holes)).toEqual([
      {
        roundId: "r1",
        date: "2024-05-20",
        courseName: "Old Course",
        holes: 2,
        totalScore: 11,
        totalPar: 9,
        totalPutts: 3,
        scoreVsPar: 2,
      },
      {
        roundId: "r2",
        date: "2024-06-01",
        courseName: "Test Links",
        holes: 2,
        totalScore: 8,
        totalPar: 7,
        totalPutts: 3,
        scoreVsPar: 1,
      },
    ]);
  });

  it("should return an empty list without holes", () => {
    expect(summarizeRounds([])).toEqual([]);
  });
});
