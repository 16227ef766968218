import path from "node:path";
import { z } from "zod";
import { DEFAULT_BASIS_METRIC, isMetricKey } from "@range-insights/shared";
import type { MetricKey } from "@range-insights/shared";
import { ValidationError } from "./lib/errors";
import type { LogLevel } from "./lib/logger";

const LogLevelSchema = z.enum(["DEBUG", "INFO", "WARNING", "ERROR"]);

const EnvSchema = z.object({
  RANGE_DATA_DIR: z.string().min(1).default("data"),
  RANGE_EXPORT_DIR: z.string().min(1).optional(),
  RANGE_BASIS_METRIC: z
    .string()
    .default(DEFAULT_BASIS_METRIC)
    .refine(isMetricKey, { message: "must be a metric key such as carryYds or smash" }),
  RANGE_LOG_LEVEL: z
    .string()
    .default("INFO")
    .transform((value) => value.toUpperCase())
    .pipe(LogLevelSchema),
});

export type AnalyzerConfig = {
  dataDir: string;
  sessionsDir: string;
  roundsDir: string;
  exportDir: string;
  basisMetric: MetricKey;
  logLevel: LogLevel;
};

/**
 * Resolve configuration from environment variables
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AnalyzerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError("Invalid analyzer configuration", { issues });
  }

  const { RANGE_DATA_DIR, RANGE_EXPORT_DIR, RANGE_BASIS_METRIC, RANGE_LOG_LEVEL } = parsed.data;
  return buildConfig({
    dataDir: RANGE_DATA_DIR,
    exportDir: RANGE_EXPORT_DIR,
    basisMetric: RANGE_BASIS_METRIC,
    logLevel: RANGE_LOG_LEVEL,
  });
}

export function buildConfig(options: {
  dataDir: string;
  exportDir?: string;
  basisMetric?: MetricKey;
  logLevel?: LogLevel;
}): AnalyzerConfig {
  return {
    dataDir: options.dataDir,
    sessionsDir: path.join(options.dataDir, "sessions"),
    roundsDir: path.join(options.dataDir, "rounds"),
    exportDir: options.exportDir ?? path.join(options.dataDir, "exports"),
    basisMetric: options.basisMetric ?? DEFAULT_BASIS_METRIC,
    logLevel: options.logLevel ?? "INFO",
  };
}
