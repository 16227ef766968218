import { mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import path from "node:path";
import Papa from "papaparse";
import type { HoleRecord } from "@range-insights/shared";
import { StorageError } from "../lib/errors";
import { slugify } from "../lib/ids";
import type { ILogger } from "../lib/logger";
import { defaultLogger } from "../lib/logger";
import { parseCsvRows, toNum, toText } from "../lib/shotCsv";

export type StoredHoleRecord = HoleRecord & { roundFile: string };

export type RoundMeta = {
  roundId: string;
  date: string;
  courseName?: string | null;
};

const ROUND_COLUMNS = [
  "hole",
  "par",
  "score",
  "putts",
  "fairway",
  "green",
  "drive_distance",
  "round_id",
  "date",
  "course_name",
] as const;

export function roundFileName(meta: RoundMeta): string {
  return meta.courseName
    ? `${meta.date}_${slugify(meta.courseName)}_${meta.roundId}.csv`
    : `${meta.date}_${meta.roundId}.csv`;
}

function toBool(v: unknown): boolean | null {
  if (typeof v === "boolean") return v;
  if (v === null || v === undefined) return null;
  const s = String(v).trim().toLowerCase();
  if (s === "true" || s === "1") return true;
  if (s === "false" || s === "0") return false;
  return null;
}

/**
 * Normalized scorecards, one CSV per round
 */
export class RoundRepository {
  private readonly logger: ILogger;

  constructor(private readonly options: { roundsDir: string; logger?: ILogger }) {
    this.logger = (options.logger ?? defaultLogger).child({ repository: "rounds" });
  }

  get dir() {
    return this.options.roundsDir;
  }

  async saveRound(holes: readonly HoleRecord[], meta: RoundMeta): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const target = path.join(this.dir, roundFileName(meta));

    const csv = Papa.unparse(
      {
        fields: [...ROUND_COLUMNS],
        data: holes.map((h) => [
          h.hole,
          h.par,
          h.score,
          h.putts,
          h.fairwayHit,
          h.greenInRegulation,
          h.driveDistance,
          meta.roundId,
          meta.date,
          meta.courseName ?? "",
        ]),
      },
      { newline: "\n" }
    );

    try {
      await writeFile(target, `${csv}\n`, "utf-8");
    } catch (error) {
      throw new StorageError("write", `could not save round ${meta.roundId}`, { target }, error instanceof Error ? error : undefined);
    }

    this.logger.info("round saved", { roundId: meta.roundId, path: target });
    return target;
  }

  async loadAllRounds(): Promise<StoredHoleRecord[]> {
    await mkdir(this.dir, { recursive: true });
    const files = (await readdir(this.dir)).filter((name) => name.endsWith(".csv")).sort();
    const holes: StoredHoleRecord[] = [];

    for (const roundFile of files) {
      const filePath = path.join(this.dir, roundFile);
      let text: string;
      try {
        text = await readFile(filePath, "utf-8");
      } catch (error) {
        throw new StorageError("read", `could not read ${roundFile}`, { filePath }, error instanceof Error ? error : undefined);
      }

      const { rows } = parseCsvRows(text);
      for (const row of rows) {
        holes.push({
          roundFile,
          roundId: toText(row.round_id) ?? "unknown",
          date: toText(row.date) ?? "unknown",
          courseName: toText(row.course_name),
          hole: toNum(row.hole),
          par: toNum(row.par),
          score: toNum(row.score),
          putts: toNum(row.putts),
          fairwayHit: toBool(row.fairway),
          greenInRegulation: toBool(row.green),
          driveDistance: toNum(row.drive_distance),
        });
      }
    }

    this.logger.debug("rounds loaded", { files: files.length, holes: holes.length });
    return holes;
  }
}
