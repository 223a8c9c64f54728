import { mkdir } from "node:fs/promises";
import path from "node:path";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { logger } from "../utils/simple-logger.js";
import { formatFileTimestamp } from "./timestamp.js";

export const DEFAULT_LOG_DIR = "latency-sentinel_logs";

export interface LogFileOptions {
  logFile?: string;
  logDir?: string;
  cwd: string;
  now: Date;
}

/**
 * Log file for a session: the explicit path when given, otherwise a
 * timestamped file under `logDir` (relative paths resolve against `cwd`).
 */
export function resolveLogFilePath(options: LogFileOptions): string {
  return options.logFile
    ? path.resolve(options.cwd, options.logFile)
    : path.resolve(
        options.cwd,
        options.logDir ?? DEFAULT_LOG_DIR,
        `session_${formatFileTimestamp(options.now)}.txt`,
      );
}

/**
 * Resolves the log file and creates its directory. Returns undefined when
 * the directory cannot be created; the session then runs console-only.
 */
export async function prepareLogFile(options: LogFileOptions): Promise<string | undefined> {
  const target = resolveLogFilePath(options);
  try {
    await mkdir(path.dirname(target), { recursive: true });
    return target;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn({ log_file: target, error: reason }, "Cannot create log directory, continuing without a log file");
    emit(TelemetryEvents.SinkWriteFailed, { log_file: target, error: reason });
    return undefined;
  }
}
