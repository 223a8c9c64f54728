/**
 * Monitoring session
 *
 * One sequential probe loop: probe, record, recompute the threshold when
 * due, classify, write. Stops on the time limit or when the abort signal
 * fires, and always finishes by writing the summary.
 */

import type { MonitorConfig } from "../config/monitor.js";
import type { OutputSink } from "../output/sink.js";
import type { Prober, ProbeResult } from "../probe/types.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { logger } from "../utils/simple-logger.js";
import { sleep } from "../utils/sleep.js";
import { SampleStore } from "./sample-store.js";
import { classify, createSpikeRecord, type SpikeRecord } from "./spike-classifier.js";
import { computeStatistics } from "./statistics.js";
import {
  computeSuccessRate,
  formatMs,
  formatSummary,
  type SessionSummary,
  type StopReason,
} from "./summary.js";
import { AdaptiveThresholdController, type ThresholdUpdate } from "./threshold-controller.js";

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export interface SessionDependencies {
  prober: Prober;
  sink: OutputSink;
  clock?: Clock;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface SessionCounts {
  totalAttempts: number;
  successes: number;
  failures: number;
}

export class SessionCoordinator {
  private readonly config: MonitorConfig;
  private readonly prober: Prober;
  private readonly sink: OutputSink;
  private readonly clock: Clock;
  private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void>;

  private readonly store = new SampleStore();
  private readonly controller: AdaptiveThresholdController;
  private readonly spikes: SpikeRecord[] = [];
  private readonly counts: SessionCounts = { totalAttempts: 0, successes: 0, failures: 0 };
  private started = false;

  constructor(config: MonitorConfig, deps: SessionDependencies) {
    this.config = config;
    this.prober = deps.prober;
    this.sink = deps.sink;
    this.clock = deps.clock ?? systemClock;
    this.wait = deps.sleep ?? sleep;
    this.controller = new AdaptiveThresholdController({
      multiplierPercent: config.spikeMultiplierPercent,
      recomputeInterval: config.recomputeInterval,
      minThresholdMs: config.minThresholdMs,
      maxThresholdMs: config.maxThresholdMs,
      initialThresholdMs: config.initialThresholdMs,
      warmupSamples: config.warmupSamples,
    });
  }

  /**
   * Run the session to completion. A coordinator runs once.
   */
  async run(signal?: AbortSignal): Promise<SessionSummary> {
    if (this.started) {
      throw new Error("SessionCoordinator.run() can only be called once");
    }
    this.started = true;

    const startMs = this.clock.now();
    const limitMs = this.config.timeLimitSeconds * 1000;
    const { destination, spikeMultiplierPercent } = this.config;

    emit(TelemetryEvents.SessionStarted, {
      destination,
      interval_ms: this.config.intervalMs,
      time_limit_s: this.config.timeLimitSeconds,
      multiplier_pct: spikeMultiplierPercent,
    });
    await this.sink.write(
      `Ping session started - Target: ${destination}, Adaptive spike detection: ${spikeMultiplierPercent}% multiplier`,
    );

    let stopReason: StopReason;
    for (;;) {
      if (signal?.aborted) {
        stopReason = "cancelled";
        await this.sink.write("Interrupted by user. Generating final statistics...");
        break;
      }

      const tickStart = this.clock.now();
      if (limitMs > 0 && tickStart - startMs >= limitMs) {
        stopReason = "time_limit";
        await this.sink.write(
          `Time limit of ${this.config.timeLimitSeconds} seconds reached. Stopping ping.`,
        );
        break;
      }

      await this.tick();

      const delay = tickStart + this.config.intervalMs - this.clock.now();
      if (delay > 0 && !signal?.aborted) {
        await this.wait(delay, signal);
      }
    }

    return this.finish(startMs, stopReason);
  }

  private async tick(): Promise<void> {
    this.counts.totalAttempts += 1;
    const result = await this.probeOnce();
    const timestamp = new Date(this.clock.now());
    const latencyMs = result.latencyMs;

    if (!result.success || latencyMs === undefined || !Number.isFinite(latencyMs) || latencyMs < 0) {
      this.counts.failures += 1;
      emit(TelemetryEvents.ProbeFailed, {
        destination: this.config.destination,
        reason: result.rawMessage.substring(0, 100),
      });
      await this.sink.write(`Request failed: ${result.rawMessage || "no reply"}`);
      return;
    }

    this.store.append(latencyMs, timestamp);
    this.counts.successes += 1;
    emit(TelemetryEvents.ProbeSucceeded, {
      destination: this.config.destination,
      latency_ms: latencyMs,
    });

    const update = this.controller.onSample(this.store.view());
    if (update) {
      await this.onThresholdRecomputed(update);
    }

    const thresholdMs = this.controller.thresholdMs;
    const isSpike = classify(latencyMs, this.store.length, thresholdMs, this.controller.warmupSamples);
    if (isSpike) {
      this.spikes.push(createSpikeRecord(latencyMs, thresholdMs, result.rawMessage, timestamp));
      emit(TelemetryEvents.SpikeDetected, {
        destination: this.config.destination,
        latency_ms: latencyMs,
        threshold_ms: thresholdMs,
      });
      await this.sink.write(`${result.rawMessage} [SPIKE]`);
      return;
    }

    await this.sink.write(result.rawMessage);
  }

  private async probeOnce(): Promise<ProbeResult> {
    try {
      return await this.prober.probe(this.config.destination, this.config.probeTimeoutMs);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ destination: this.config.destination, error: message }, "Prober threw");
      return { success: false, rawMessage: message };
    }
  }

  private async onThresholdRecomputed(update: ThresholdUpdate): Promise<void> {
    emit(TelemetryEvents.ThresholdRecomputed, {
      destination: this.config.destination,
      sample_count: update.sampleCount,
      baseline_ms: update.baseline,
      threshold_ms: update.thresholdMs,
    });

    if (!this.config.debug) return;

    await this.sink.write(
      `Adaptive threshold updated: ${formatMs(update.thresholdMs)}ms (after ${update.sampleCount} pings)`,
    );
    await this.sink.write(
      `  -> Trimmed mean: ${formatMs(update.trimmedMean)}ms, Jitter: ${formatMs(update.trimmedJitter)}ms, Baseline: ${formatMs(update.baseline)}ms`,
    );
    await this.sink.write(
      `  -> Pre-constraint: ${formatMs(update.rawThresholdMs)}ms, Final: ${formatMs(update.thresholdMs)}ms`,
    );
  }

  private async finish(startMs: number, stopReason: StopReason): Promise<SessionSummary> {
    const endMs = this.clock.now();
    const summary: SessionSummary = {
      destination: this.config.destination,
      startedAt: new Date(startMs),
      endedAt: new Date(endMs),
      elapsedMs: Math.max(0, endMs - startMs),
      totalAttempts: this.counts.totalAttempts,
      successes: this.counts.successes,
      failures: this.counts.failures,
      successRate: computeSuccessRate(this.counts.successes, this.counts.totalAttempts),
      statistics: computeStatistics(this.store.view()),
      thresholdMs: this.controller.thresholdMs,
      multiplierPercent: this.config.spikeMultiplierPercent,
      spikes: [...this.spikes],
      stopReason,
    };

    for (const line of formatSummary(summary)) {
      await this.sink.write(line);
    }
    await this.sink.write("Ping session ended");

    emit(TelemetryEvents.SessionCompleted, {
      destination: summary.destination,
      total_attempts: summary.totalAttempts,
      successes: summary.successes,
      failures: summary.failures,
      success_rate: summary.successRate,
      spikes: summary.spikes.length,
      elapsed_ms: summary.elapsedMs,
      stop_reason: stopReason,
    });

    return summary;
  }
}
