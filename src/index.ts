export { computeStatistics, classifyJitter, mean, populationStdDev } from "./monitor/statistics.js";
export type { JitterQuality, Statistics } from "./monitor/statistics.js";
export { estimateBaseline } from "./monitor/baseline.js";
export type { BaselineEstimate } from "./monitor/baseline.js";
export {
  AdaptiveThresholdController,
  clampThreshold,
  computeThreshold,
  DEFAULT_THRESHOLD_SETTINGS,
} from "./monitor/threshold-controller.js";
export type { ThresholdPhase, ThresholdSettings, ThresholdUpdate } from "./monitor/threshold-controller.js";
export { classify, createSpikeRecord } from "./monitor/spike-classifier.js";
export type { SpikeRecord } from "./monitor/spike-classifier.js";
export { SampleStore } from "./monitor/sample-store.js";
export type { Sample } from "./monitor/sample-store.js";
export { SessionCoordinator, systemClock } from "./monitor/session.js";
export type { Clock, SessionCounts, SessionDependencies } from "./monitor/session.js";
export { computeSuccessRate, formatMs, formatSuccessRate, formatSummary } from "./monitor/summary.js";
export type { SessionSummary, StopReason } from "./monitor/summary.js";
export { MonitorConfigSchema, parseMonitorConfig } from "./config/monitor.js";
export type { MonitorConfig } from "./config/monitor.js";
export { SystemPingProber, buildPingArgs } from "./probe/system-ping.js";
export { parsePingOutput } from "./probe/ping-output.js";
export type { Prober, ProbeResult } from "./probe/types.js";
export { ConsoleFileSink, MemorySink } from "./output/sink.js";
export type { OutputSink } from "./output/sink.js";
export { ConfigError, toErrorV1 } from "./utils/errors.js";
export type { ErrorCode, ErrorV1 } from "./utils/errors.js";
