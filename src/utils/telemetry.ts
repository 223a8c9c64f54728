import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { config, isTest } from "../config/index.js";
import { createLogDestination, createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger (stderr, JSON)
 *
 * Created at import time from LOG_LEVEL directly, before the config module
 * is first parsed.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "warn"), createLogDestination());

/**
 * Test sink for capturing telemetry events in tests
 */
let testSink: ((eventName: string, data: TelemetryShape) => void) | null = null;

export function setTestSink(sink: ((eventName: string, data: TelemetryShape) => void) | null): void {
  if (!isTest()) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * Dashboards key on these; rename only together with them.
 */
export const TelemetryEvents = {
  SessionStarted: "session.started",
  SessionCompleted: "session.completed",

  ProbeSucceeded: "probe.succeeded",
  ProbeFailed: "probe.failed",

  ThresholdRecomputed: "threshold.recomputed",
  SpikeDetected: "spike.detected",

  SinkWriteFailed: "sink.write_failed",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * All valid event names
 */
export const VALID_EVENT_NAMES: Set<string> = new Set(Object.values(TelemetryEvents));

/**
 * StatsD client (optional, configured via STATSD_HOST)
 */
let statsdClient: StatsD | null | undefined;

function getStatsd(): StatsD | null {
  if (statsdClient !== undefined) return statsdClient;

  const { host, port, prefix } = config.metrics;
  if (!host) {
    statsdClient = null;
    return statsdClient;
  }

  statsdClient = new StatsD({
    host,
    port,
    prefix,
    errorHandler: (error: Error) => {
      log.error({ error }, "StatsD error");
    },
  });
  log.info({ statsd_host: host, statsd_port: port }, "StatsD client initialized");
  return statsdClient;
}

/**
 * Close the StatsD socket so the process can exit
 */
export function closeTelemetry(): Promise<void> {
  const client = statsdClient;
  statsdClient = undefined;
  if (!client) return Promise.resolve();
  return new Promise((resolve) => {
    client.close((error) => {
      if (error) {
        log.warn({ error }, "StatsD close failed");
      }
      resolve();
    });
  });
}

export type TelemetryLeaf = string | number | boolean | null;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
type TelemetryValue = TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;

function sanitizeTelemetryValue(value: unknown): TelemetryValue | undefined {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(value);
  }

  return undefined;
}

function sanitizeTelemetryData(data: object): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

function tagOf(value: TelemetryValue | undefined, fallback: string): string {
  return typeof value === "string" || typeof value === "number" ? String(value) : fallback;
}

export function emit(event: TelemetryEventName, data: Record<string, unknown>): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  log.debug({ event, ...eventData });

  const statsd = getStatsd();
  if (!statsd) return;

  try {
    const tags = { destination: tagOf(eventData.destination, "unknown") };
    switch (event) {
      case TelemetryEvents.ProbeSucceeded:
        if (typeof eventData.latency_ms === "number") {
          statsd.histogram("probe.latency_ms", eventData.latency_ms, tags);
        }
        statsd.increment("probe.succeeded", 1, tags);
        break;

      case TelemetryEvents.ProbeFailed:
        statsd.increment("probe.failed", 1, tags);
        break;

      case TelemetryEvents.ThresholdRecomputed:
        if (typeof eventData.threshold_ms === "number") {
          statsd.gauge("threshold.current_ms", eventData.threshold_ms, tags);
        }
        if (typeof eventData.baseline_ms === "number") {
          statsd.gauge("threshold.baseline_ms", eventData.baseline_ms, tags);
        }
        break;

      case TelemetryEvents.SpikeDetected:
        statsd.increment("spike.detected", 1, tags);
        break;

      case TelemetryEvents.SessionCompleted:
        if (typeof eventData.success_rate === "number") {
          statsd.gauge("session.success_rate", eventData.success_rate, tags);
        }
        statsd.increment("session.completed", 1, {
          ...tags,
          stop_reason: tagOf(eventData.stop_reason, "unknown"),
        });
        break;

      case TelemetryEvents.SinkWriteFailed:
        statsd.increment("sink.write_failed", 1);
        break;

      default:
        statsd.increment(event, 1, tags);
        break;
    }
  } catch (error) {
    log.error({ error, event }, "Failed to send StatsD metrics");
  }
}
