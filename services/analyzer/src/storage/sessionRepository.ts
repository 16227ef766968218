import { mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { emptyShotTable } from "@range-insights/shared";
import type { ShotTable } from "@range-insights/shared";
import { parseSessionLabel } from "../calculators/sessionLabel";
import { MissingFieldError, RangeInsightsError, StorageError } from "../lib/errors";
import { safeFileName } from "../lib/ids";
import type { ILogger } from "../lib/logger";
import { defaultLogger } from "../lib/logger";
import { concatShotTables, parseShotCsv } from "../lib/shotCsv";

export type UploadedFile = {
  name: string;
  data: Uint8Array | string;
};

export type SessionRepositoryOptions = {
  sessionsDir: string;
  logger?: ILogger;
};

/**
 * One CSV file per practice session. Re-importing a file name overwrites it.
 */
export class SessionRepository {
  private readonly logger: ILogger;

  constructor(private readonly options: SessionRepositoryOptions) {
    this.logger = (options.logger ?? defaultLogger).child({ repository: "sessions" });
  }

  get dir() {
    return this.options.sessionsDir;
  }

  async ensureDir() {
    await mkdir(this.dir, { recursive: true });
    return this.dir;
  }

  async listFiles(): Promise<string[]> {
    await this.ensureDir();
    const entries = await readdir(this.dir);
    return entries.filter((name) => name.endsWith(".csv")).sort();
  }

  async saveUploadedSessions(files: readonly UploadedFile[]): Promise<string[]> {
    await this.ensureDir();
    const saved: string[] = [];

    for (const file of files) {
      const target = path.join(this.dir, safeFileName(file.name));
      try {
        await writeFile(target, file.data);
      } catch (error) {
        throw new StorageError("write", `could not save ${file.name}`, { target }, error instanceof Error ? error : undefined);
      }
      saved.push(target);
    }

    this.logger.info("sessions imported", { count: saved.length });
    return saved;
  }

  /**
   * Load every session file into one shot table. Files without a `club`
   * column or without a header are logged and skipped.
   */
  async loadAllSessions(): Promise<ShotTable> {
    const files = await this.listFiles();
    const tables: ShotTable[] = [];

    for (const sessionFile of files) {
      const text = await this.readSession(sessionFile);
      try {
        tables.push(parseShotCsv(text, { sessionFile, sessionLabel: parseSessionLabel(sessionFile) }));
      } catch (error) {
        if (!(error instanceof RangeInsightsError)) throw error;
        if (error instanceof MissingFieldError) {
          this.logger.error("session file has no club column, skipped", error, { sessionFile });
        } else {
          this.logger.warn("session file could not be parsed, skipped", { sessionFile, reason: error.message });
        }
      }
    }

    if (tables.length === 0) return emptyShotTable();

    const table = concatShotTables(tables);
    this.logger.debug("sessions loaded", { files: tables.length, shots: table.rows.length });
    return table;
  }

  private async readSession(sessionFile: string) {
    const filePath = path.join(this.dir, sessionFile);
    try {
      return await readFile(filePath, "utf-8");
    } catch (error) {
      throw new StorageError("read", `could not read ${sessionFile}`, { filePath }, error instanceof Error ? error : undefined);
    }
  }
}
