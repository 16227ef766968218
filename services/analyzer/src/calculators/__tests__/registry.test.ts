import { describe, it, expect } from "vitest";
import { runCalculators } from "../registry";
import { createShot, createShotTable, inSession } from "../../lib/testHelpers";

const table = createShotTable([
  createShot({ ...inSession("s1.csv", "S1"), club: "7 Iron", smash: 1.3, carryYds: 150 }),
  createShot({ ...inSession("s1.csv", "S1"), club: "7 Iron", smash: 1.3, carryYds: 150 }),
  createShot({ ...inSession("s1.csv", "S1"), club: "7 Iron", smash: 1.3, carryYds: 150 }),
  createShot({ ...inSession("s2.csv", "S2"), club: "7 Iron", smash: 1.35, carryYds: 155 }),
  createShot({ ...inSession("s2.csv", "S2"), club: "Driver", smash: 1.44, carryYds: 240 }),
]);

describe("runCalculators", () => {
  it("should build every section of the report", () => {
    const report = runCalculators({ table });

    expect(report.status).toBe("ok");
    expect(report.shotCount).toBe(5);
    expect(report.clubs).toEqual(["Driver", "7 Iron"]);
    expect(report.metrics).toEqual(["smash", "carryYds"]);
    expect(report.selectedMetric).toBe("carryYds");
    expect(report.basisMetric).toBe("carryYds");
    expect(report.clubStats.map((s) => [s.sessionLabel, s.club, s.shots])).toEqual([
      ["S1", "7 Iron", 3],
      ["S2", "7 Iron", 1],
      ["S2", "Driver", 1],
    ]);
    expect(report.clubStats[0].consistencyIndex).toBe(100);
    expect(report.trends).toEqual([
      {
        club: "7 Iron",
        firstSmash: 1.3,
        lastSmash: 1.35,
        deltaSmash: 0.05,
        trend: "improving",
        orderedBy: "sessionLabel",
      },
    ]);
    expect(report.series).toHaveLength(3);
    expect(report.raw.metrics).toEqual(["smash", "carryYds"]);
    expect(report.raw.rows).toHaveLength(5);
  });

  it("should return the same report for the same input", () => {
    expect(runCalculators({ table })).toEqual(runCalculators({ table }));
  });

  it("should report no_data when the filter removes every row", () => {
    const report = runCalculators({ table, filter: { clubs: ["Putter"] } });
    expect(report.status).toBe("no_data");
    expect(report.shotCount).toBe(0);
    expect(report.clubStats).toEqual([]);
    expect(report.clubs).toEqual(["Driver", "7 Iron"]);
    expect(report.raw.rows).toEqual([]);
  });

  it("should report no_efficiency without a smash column", () => {
    const carryOnly = createShotTable([createShot({ club: "7 Iron", carryYds: 150 })]);
    const report = runCalculators({ table: carryOnly });
    expect(report.status).toBe("no_efficiency");
    expect(report.clubStats).toEqual([]);
    expect(report.trends).toEqual([]);
    expect(report.series).toEqual([
      { sessionFile: "saturday__05_46_pm.csv", sessionLabel: "Saturday 05:46 PM", club: "7 Iron", value: 150 },
    ]);
  });

  it("should keep pickers on the full table while filtering the rest", () => {
    const report = runCalculators({ table, filter: { sessions: ["s2.csv"] } });
    expect(report.sessions.map((s) => s.sessionFile)).toEqual(["s1.csv", "s2.csv"]);
    expect(report.shotCount).toBe(2);
    expect(report.trends).toEqual([]);
  });

  it("should fall back to smash when the basis metric is missing", () => {
    const report = runCalculators({ table, basisMetric: "spinRpm" });
    expect(report.basisMetric).toBe("smash");
  });

  it("should ignore a selected metric the table lacks", () => {
    const report = runCalculators({ table, selectedMetric: "spinRpm" });
    expect(report.selectedMetric).toBe("carryYds");
  });
});
