import { describe, it, expect } from "vitest";
import { concatShotTables, parseCsvRows, parseShotCsv, toNum, toText, toTimestamp } from "../shotCsv";
import { MissingFieldError, ValidationError } from "../errors";

const session = { sessionFile: "sunday__09_00_am.csv", sessionLabel: "Sunday 09:00 AM" };

describe("toNum", () => {
  it("should coerce numeric text and drop everything else", () => {
    expect(toNum("1.31")).toBe(1.31);
    expect(toNum(" 150 ")).toBe(150);
    expect(toNum(42)).toBe(42);
    expect(toNum("")).toBeNull();
    expect(toNum("n/a")).toBeNull();
    expect(toNum(undefined)).toBeNull();
  });
});

describe("toText", () => {
  it("should trim text and treat blanks as missing", () => {
    expect(toText(" S1 ")).toBe("S1");
    expect(toText(7)).toBe("7");
    expect(toText("   ")).toBeNull();
    expect(toText(null)).toBeNull();
  });
});

describe("toTimestamp", () => {
  it("should parse ISO date text to epoch milliseconds", () => {
    expect(toTimestamp("2024-05-04T10:00:00Z")).toBe(1714816800000);
    expect(toTimestamp("not a date")).toBeNull();
    expect(toTimestamp("")).toBeNull();
  });
});

describe("parseCsvRows", () => {
  it("should read comma separated files", () => {
    const { fields, rows } = parseCsvRows("club,Smash\n7 Iron,1.31\n");
    expect(fields).toEqual(["club", "Smash"]);
    expect(rows).toEqual([{ club: "7 Iron", Smash: "1.31" }]);
  });

  it("should retry with semicolons", () => {
    const { fields, rows } = parseCsvRows("club;Smash;Carry (yds)\nDriver;1.45;231\n");
    expect(fields).toEqual(["club", "Smash", "Carry (yds)"]);
    expect(rows[0]).toEqual({ club: "Driver", Smash: "1.45", "Carry (yds)": "231" });
  });

  it("should trim header names", () => {
    expect(parseCsvRows(" club , Smash \nDriver,1.4\n").fields).toEqual(["club", "Smash"]);
  });

  it("should reject an empty file", () => {
    expect(() => parseCsvRows("")).toThrow(ValidationError);
  });
});

describe("parseShotCsv", () => {
  it("should map display columns onto metric keys", () => {
    const text = ["Shot,club,Smash,Carry (yds),AOA (°),Notes", "1,7 Iron,1.31,152.5,-3.2,flush", "2,7 Iron,,148,,"].join("\n");
    const table = parseShotCsv(text, session);

    expect(table.columns).toEqual(["smash", "carryYds", "aoaDeg", "shot"]);
    expect(table.rows).toHaveLength(2);
    expect(table.rows[0]).toMatchObject({
      sessionFile: "sunday__09_00_am.csv",
      sessionLabel: "Sunday 09:00 AM",
      club: "7 Iron",
      shot: "1",
      smash: 1.31,
      carryYds: 152.5,
      aoaDeg: -3.2,
      spinRpm: null,
      capturedAt: null,
    });
    expect(table.rows[1]).toMatchObject({ shot: "2", smash: null, carryYds: 148, aoaDeg: null });
  });

  it("should keep shot ids as text", () => {
    const table = parseShotCsv("Shot,club,Smash\nS1,Driver,1.4\n ,Driver,1.5\n", session);
    expect(table.rows.map((row) => row.shot)).toEqual(["S1", null]);
  });

  it("should read capture times from a Date column", () => {
    const table = parseShotCsv("club,Smash,Date\nDriver,1.44,2024-05-04T09:30:00Z\n", session);
    expect(table.columns).toEqual(["smash", "capturedAt"]);
    expect(table.rows[0].capturedAt).toBe(1714815000000);
  });

  it("should fail without a club column", () => {
    expect(() => parseShotCsv("Smash,Carry (yds)\n1.3,150\n", session)).toThrow(MissingFieldError);
    expect(() => parseShotCsv("Smash,Carry (yds)\n1.3,150\n", session)).toThrow("Missing required field: club");
  });
});

describe("concatShotTables", () => {
  it("should union columns in first-seen order and keep every row", () => {
    const a = parseShotCsv("club,Smash\nDriver,1.44\n", session);
    const b = parseShotCsv("club,Carry (yds),Smash\n7 Iron,150,1.3\n", { sessionFile: "b.csv", sessionLabel: "b" });
    const merged = concatShotTables([a, b]);

    expect(merged.columns).toEqual(["smash", "carryYds"]);
    expect(merged.rows.map((row) => [row.sessionFile, row.club, row.carryYds])).toEqual([
      ["sunday__09_00_am.csv", "Driver", null],
      ["b.csv", "7 Iron", 150],
    ]);
  });

  it("should return an empty table for no input", () => {
    expect(concatShotTables([])).toEqual({ columns: [], rows: [] });
  });
});
