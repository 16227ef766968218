/**
 * Test helper utilities for analyzer tests
 *
 * Factory functions with sensible defaults; every builder takes partial overrides.
 *
 * @example
 * const table = createShotTable([
 *   createShot({ club: "7 Iron", smash: 1.31 }),
 *   createShot({ club: "7 Iron", smash: 1.33 }),
 * ]);
 */

import type {
  ClubSessionStats,
  HoleRecord,
  ShotColumn,
  ShotRecord,
  ShotTable,
} from "@range-insights/shared";
import { vi } from "vitest";
import type { ILogger } from "./logger";

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_SESSION_FILE = "saturday__05_46_pm.csv";
const DEFAULT_SESSION_LABEL = "Saturday 05:46 PM";

// ============================================================================
// Shots
// ============================================================================

export function createShot(overrides: Partial<ShotRecord> = {}): ShotRecord {
  return {
    sessionFile: DEFAULT_SESSION_FILE,
    sessionLabel: DEFAULT_SESSION_LABEL,
    club: "Driver",
    shot: null,
    capturedAt: null,
    ballSpeedMph: null,
    clubSpeedMph: null,
    smash: null,
    carryYds: null,
    totalYds: null,
    rollYds: null,
    spinRpm: null,
    heightFt: null,
    flightTimeS: null,
    aoaDeg: null,
    spinLoftDeg: null,
    swingPlaneDeg: null,
    curveDistYds: null,
    ...overrides,
  };
}

/**
 * Build a table; columns default to every field set on at least one row.
 */
export function createShotTable(rows: ShotRecord[], columns?: ShotColumn[]): ShotTable {
  if (columns) return { columns, rows };

  const detected = new Set<ShotColumn>();
  const optional: ShotColumn[] = [
    "shot",
    "capturedAt",
    "ballSpeedMph",
    "clubSpeedMph",
    "smash",
    "carryYds",
    "totalYds",
    "rollYds",
    "spinRpm",
    "heightFt",
    "flightTimeS",
    "aoaDeg",
    "spinLoftDeg",
    "swingPlaneDeg",
    "curveDistYds",
  ];
  for (const row of rows) {
    for (const column of optional) {
      if (row[column] !== null) detected.add(column);
    }
  }
  return { columns: optional.filter((c) => detected.has(c)), rows };
}

/**
 * Session shortcut: same file and label
 */
export function inSession(sessionFile: string, sessionLabel = sessionFile): Pick<ShotRecord, "sessionFile" | "sessionLabel"> {
  return { sessionFile, sessionLabel };
}

// ============================================================================
// Aggregates
// ============================================================================

export function createClubSessionStats(overrides: Partial<ClubSessionStats> = {}): ClubSessionStats {
  return {
    sessionFile: DEFAULT_SESSION_FILE,
    sessionLabel: DEFAULT_SESSION_LABEL,
    club: "7 Iron",
    shots: 10,
    smashAvg: 1.3,
    smashStd: 0.02,
    targetSmash: 1.33,
    smashDiff: -0.03,
    consistencyIndex: 95,
    capturedAt: null,
    ...overrides,
  };
}

// ============================================================================
// Rounds
// ============================================================================

export function createHole(overrides: Partial<HoleRecord> = {}): HoleRecord {
  return {
    roundId: "round-1",
    date: "2024-05-04",
    courseName: "Test Links",
    hole: 1,
    par: 4,
    score: 4,
    putts: 2,
    fairwayHit: true,
    greenInRegulation: true,
    driveDistance: 240,
    ...overrides,
  };
}

// ============================================================================
// Logging
// ============================================================================

export type MockLogger = ILogger & {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
};

/**
 * Logger whose methods are spies; child() returns the same instance
 */
export function createMockLogger(): MockLogger {
  const logger: MockLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}
