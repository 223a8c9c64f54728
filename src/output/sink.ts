import { appendFile } from "node:fs/promises";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { logger } from "../utils/simple-logger.js";
import { formatTimestamp } from "./timestamp.js";

/**
 * Destination for the session's human-readable feed.
 *
 * `write` never rejects: a sink that cannot persist a line reports it and
 * carries on.
 */
export interface OutputSink {
  write(message: string): Promise<void>;
}

export interface LineWriter {
  write(chunk: string): unknown;
}

export interface ConsoleFileSinkOptions {
  /** Append-only log file; console only when omitted */
  logFile?: string;
  stdout?: LineWriter;
  now?: () => Date;
  append?: (file: string, data: string) => Promise<void>;
}

/**
 * Prints each line to stdout and appends it to the session log file.
 */
export class ConsoleFileSink implements OutputSink {
  readonly logFile: string | undefined;
  private readonly stdout: LineWriter;
  private readonly now: () => Date;
  private readonly append: (file: string, data: string) => Promise<void>;
  private failedWrites = 0;

  constructor(options: ConsoleFileSinkOptions = {}) {
    this.logFile = options.logFile;
    this.stdout = options.stdout ?? process.stdout;
    this.now = options.now ?? (() => new Date());
    this.append = options.append ?? ((file, data) => appendFile(file, data, "utf8"));
  }

  /** Lines that could not be persisted so far */
  get persistFailures(): number {
    return this.failedWrites;
  }

  async write(message: string): Promise<void> {
    const line = `${formatTimestamp(this.now())} - ${message}`;
    this.stdout.write(`${line}\n`);

    if (!this.logFile) return;

    try {
      await this.append(this.logFile, `${line}\n`);
    } catch (error) {
      this.failedWrites += 1;
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn({ log_file: this.logFile, error: reason }, "Failed to write session log line");
      emit(TelemetryEvents.SinkWriteFailed, { failed_writes: this.failedWrites });
    }
  }
}

/**
 * Keeps lines in memory, for embedding and tests.
 */
export class MemorySink implements OutputSink {
  readonly lines: string[] = [];

  async write(message: string): Promise<void> {
    this.lines.push(message);
  }
}
