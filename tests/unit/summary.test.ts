import { describe, it, expect } from "vitest";
import { createSpikeRecord } from "../../src/monitor/spike-classifier.js";
import { computeStatistics } from "../../src/monitor/statistics.js";
import {
  computeSuccessRate,
  formatMs,
  formatSuccessRate,
  formatSummary,
  SUMMARY_RULE,
  type SessionSummary,
} from "../../src/monitor/summary.js";

function baseSummary(overrides: Partial<SessionSummary> = {}): SessionSummary {
  return {
    destination: "192.0.2.1",
    startedAt: new Date(0),
    endedAt: new Date(4500),
    elapsedMs: 4500,
    totalAttempts: 4,
    successes: 3,
    failures: 1,
    successRate: 75,
    statistics: computeStatistics([10, 10, 20]),
    thresholdMs: 24,
    multiplierPercent: 200,
    spikes: [],
    stopReason: "time_limit",
    ...overrides,
  };
}

describe("success rate", () => {
  it("rounds to two decimals", () => {
    expect(formatSuccessRate(29, 30)).toBe("96.67%");
    expect(formatSuccessRate(1, 3)).toBe("33.33%");
    expect(formatSuccessRate(30, 30)).toBe("100.00%");
    expect(computeSuccessRate(29, 30)).toBe(96.67);
  });

  it("is zero when nothing was attempted", () => {
    expect(formatSuccessRate(0, 0)).toBe("0.00%");
  });
});

describe("formatMs", () => {
  it("drops trailing zeros and keeps at most two decimals", () => {
    expect(formatMs(12)).toBe("12");
    expect(formatMs(12.5)).toBe("12.5");
    expect(formatMs(10 / 3)).toBe("3.33");
    expect(formatMs(31.52)).toBe("31.52");
  });
});

describe("formatSummary", () => {
  it("lists counts, statistics and numbered spikes", () => {
    const spike = createSpikeRecord(30, 24, "reply time=30 ms", new Date(2026, 0, 2, 3, 4, 5));
    const lines = formatSummary(baseSummary({ spikes: [spike] }));

    expect(lines).toEqual([
      SUMMARY_RULE,
      "Ping Statistics Summary:",
      "Total pings sent: 4",
      "Successful pings: 3",
      "Failed pings: 1",
      "Success rate: 75.00%",
      "Response time - Min: 10ms, Max: 20ms, Avg: 13.33ms",
      "Jitter (std dev): 4.71ms - Moderate jitter",
      "Total runtime: 4 seconds",
      SUMMARY_RULE,
      "Anomalous Spikes (adaptive threshold: 24ms @ 200%):",
      "1 - 2026-01-02 03:04:05 - reply time=30 ms (30ms > 24ms)",
    ]);
  });

  it("reports missing data without a spike section", () => {
    const lines = formatSummary(
      baseSummary({ totalAttempts: 2, successes: 0, failures: 2, successRate: 0, statistics: null }),
    );

    expect(lines).toContain("Response time - no data");
    expect(lines).toContain("Jitter (std dev): insufficient data");
    expect(lines.filter((line) => line === SUMMARY_RULE)).toHaveLength(1);
  });

  it("shows min, max and mean for a single sample but no jitter", () => {
    const lines = formatSummary(baseSummary({ statistics: computeStatistics([42]) }));
    expect(lines).toContain("Response time - Min: 42ms, Max: 42ms, Avg: 42ms");
    expect(lines).toContain("Jitter (std dev): insufficient data");
  });
});
