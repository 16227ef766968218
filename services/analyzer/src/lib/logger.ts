/**
 * JSON-line logging for analyzer jobs. Each entry carries the bound context
 * (job, trace id, session or round); entries below the minimum level are dropped.
 */

import { extractErrorInfo } from "./errors";

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

export const LOG_LEVELS: readonly LogLevel[] = ["DEBUG", "INFO", "WARNING", "ERROR"];

export type LogContext = {
  service?: string;
  job?: string;
  traceId?: string;
  sessionFile?: string;
  roundId?: string;
  [key: string]: unknown;
};

type Extra = Record<string, unknown>;

export interface ILogger {
  debug(message: string, extra?: Extra): void;
  info(message: string, extra?: Extra): void;
  warn(message: string, extra?: Extra): void;
  error(message: string, error?: unknown, extra?: Extra): void;
  child(context: Partial<LogContext>): ILogger;
}

export class Logger implements ILogger {
  constructor(
    private readonly context: LogContext = {},
    private readonly minLevel: LogLevel = "DEBUG"
  ) {}

  private write(severity: LogLevel, message: string, extra?: Extra): void {
    if (LOG_LEVELS.indexOf(severity) < LOG_LEVELS.indexOf(this.minLevel)) return;

    const entry = Object.fromEntries(
      Object.entries({
        timestamp: new Date().toISOString(),
        severity,
        message,
        ...this.context,
        ...extra,
      }).filter(([, value]) => value !== undefined)
    );
    const line = JSON.stringify(entry);

    if (severity === "ERROR") console.error(line);
    else if (severity === "WARNING") console.warn(line);
    else console.log(line);
  }

  debug(message: string, extra?: Extra): void {
    this.write("DEBUG", message, extra);
  }

  info(message: string, extra?: Extra): void {
    this.write("INFO", message, extra);
  }

  warn(message: string, extra?: Extra): void {
    this.write("WARNING", message, extra);
  }

  error(message: string, error?: unknown, extra?: Extra): void {
    if (error === undefined) {
      this.write("ERROR", message, extra);
      return;
    }

    const info = extractErrorInfo(error);
    this.write("ERROR", message, {
      errorMessage: info.message,
      errorCode: info.code,
      errorContext: info.context,
      errorCause: info.cause,
      ...extra,
    });
  }

  child(context: Partial<LogContext>): ILogger {
    return new Logger({ ...this.context, ...context }, this.minLevel);
  }
}

/**
 * Logger for one job run, tagged with a trace id so a run's lines can be grepped together
 */
export function createJobLogger(options: { job: string; minLevel?: LogLevel; traceId?: string }): ILogger {
  const traceId = options.traceId ?? `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 10)}`;
  return new Logger({ service: "analyzer", job: options.job, traceId }, options.minLevel);
}

export async function withTiming<T>(logger: ILogger, operation: string, fn: () => Promise<T>): Promise<T> {
  const startedAt = Date.now();
  try {
    const result = await fn();
    logger.info(`${operation} completed`, { operation, durationMs: Date.now() - startedAt });
    return result;
  } catch (error) {
    logger.error(`${operation} failed`, error, { operation, durationMs: Date.now() - startedAt });
    throw error;
  }
}

export const defaultLogger = new Logger({ service: "analyzer" });
