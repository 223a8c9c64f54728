import { formatTimestamp } from "../output/timestamp.js";
import type { SpikeRecord } from "./spike-classifier.js";
import type { Statistics } from "./statistics.js";

export type StopReason = "time_limit" | "cancelled";

export interface SessionSummary {
  destination: string;
  startedAt: Date;
  endedAt: Date;
  elapsedMs: number;
  totalAttempts: number;
  successes: number;
  failures: number;
  /** Percentage rounded to 2 decimals */
  successRate: number;
  /** Over all successful samples; null when there were none */
  statistics: Statistics | null;
  thresholdMs: number;
  multiplierPercent: number;
  spikes: readonly SpikeRecord[];
  stopReason: StopReason;
}

export const SUMMARY_RULE = "----------------------------------------";

function roundTo2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function computeSuccessRate(successes: number, attempts: number): number {
  if (attempts <= 0) return 0;
  return roundTo2((successes / attempts) * 100);
}

export function formatSuccessRate(successes: number, attempts: number): string {
  return `${computeSuccessRate(successes, attempts).toFixed(2)}%`;
}

/**
 * Milliseconds with at most two decimals, trailing zeros dropped.
 */
export function formatMs(value: number): string {
  return String(roundTo2(value));
}

export function formatSummary(summary: SessionSummary): string[] {
  const lines: string[] = [];
  const stats = summary.statistics;

  lines.push(SUMMARY_RULE);
  lines.push("Ping Statistics Summary:");
  lines.push(`Total pings sent: ${summary.totalAttempts}`);
  lines.push(`Successful pings: ${summary.successes}`);
  lines.push(`Failed pings: ${summary.failures}`);
  lines.push(`Success rate: ${summary.successRate.toFixed(2)}%`);

  if (stats) {
    lines.push(
      `Response time - Min: ${formatMs(stats.min)}ms, Max: ${formatMs(stats.max)}ms, Avg: ${formatMs(stats.mean)}ms`,
    );
  } else {
    lines.push("Response time - no data");
  }

  if (stats && stats.jitter !== null && stats.jitterQuality !== null) {
    lines.push(`Jitter (std dev): ${formatMs(stats.jitter)}ms - ${stats.jitterQuality} jitter`);
  } else {
    lines.push("Jitter (std dev): insufficient data");
  }

  lines.push(`Total runtime: ${Math.floor(summary.elapsedMs / 1000)} seconds`);

  if (summary.spikes.length > 0) {
    lines.push(SUMMARY_RULE);
    lines.push(
      `Anomalous Spikes (adaptive threshold: ${formatMs(summary.thresholdMs)}ms @ ${summary.multiplierPercent}%):`,
    );
    summary.spikes.forEach((spike, i) => {
      lines.push(
        `${i + 1} - ${formatTimestamp(spike.timestamp)} - ${spike.rawMessage} ` +
          `(${formatMs(spike.latencyMs)}ms > ${formatMs(spike.thresholdMs)}ms)`,
      );
    });
  }

  return lines;
}
