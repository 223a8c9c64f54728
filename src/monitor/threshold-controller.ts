/**
 * Adaptive spike threshold
 *
 * States:
 * - COLD: fewer than `warmupSamples` successes, threshold pinned at its
 *   initial value and the classifier is inactive
 * - ADAPTIVE: threshold recomputed from the robust baseline every
 *   `recomputeInterval` successes
 */

import { estimateBaseline } from "./baseline.js";

export type ThresholdPhase = "COLD" | "ADAPTIVE";

export interface ThresholdSettings {
  /** Percentage of the baseline, e.g. 200 = 2x */
  multiplierPercent: number;
  recomputeInterval: number;
  minThresholdMs: number;
  maxThresholdMs: number;
  initialThresholdMs: number;
  warmupSamples: number;
}

export const DEFAULT_THRESHOLD_SETTINGS: ThresholdSettings = {
  multiplierPercent: 200,
  recomputeInterval: 10,
  minThresholdMs: 20,
  maxThresholdMs: 500,
  initialThresholdMs: 20,
  warmupSamples: 15,
};

export interface ThresholdUpdate {
  sampleCount: number;
  trimmedMean: number;
  trimmedJitter: number;
  baseline: number;
  /** Before clamping */
  rawThresholdMs: number;
  thresholdMs: number;
}

export function clampThreshold(value: number, minMs: number, maxMs: number): number {
  return Math.max(minMs, Math.min(maxMs, value));
}

/**
 * Threshold for the given history, ignoring cadence and warm-up.
 */
export function computeThreshold(
  samples: readonly number[],
  settings: Pick<ThresholdSettings, "multiplierPercent" | "minThresholdMs" | "maxThresholdMs">,
): ThresholdUpdate {
  const estimate = estimateBaseline(samples);
  const rawThresholdMs = estimate.baseline * (settings.multiplierPercent / 100);

  return {
    sampleCount: samples.length,
    trimmedMean: estimate.trimmedMean,
    trimmedJitter: estimate.trimmedJitter,
    baseline: estimate.baseline,
    rawThresholdMs,
    thresholdMs: clampThreshold(rawThresholdMs, settings.minThresholdMs, settings.maxThresholdMs),
  };
}

export class AdaptiveThresholdController {
  private readonly settings: ThresholdSettings;
  private currentThreshold: number;
  private lastRecomputeCount = 0;

  constructor(settings: Partial<ThresholdSettings> = {}) {
    this.settings = { ...DEFAULT_THRESHOLD_SETTINGS, ...settings };
    this.currentThreshold = this.settings.initialThresholdMs;
  }

  get thresholdMs(): number {
    return this.currentThreshold;
  }

  get multiplierPercent(): number {
    return this.settings.multiplierPercent;
  }

  get warmupSamples(): number {
    return this.settings.warmupSamples;
  }

  phaseFor(sampleCount: number): ThresholdPhase {
    return sampleCount >= this.settings.warmupSamples ? "ADAPTIVE" : "COLD";
  }

  /**
   * Call after each successful sample is recorded. Returns the update when
   * this count is a recompute point, otherwise null.
   */
  onSample(samples: readonly number[]): ThresholdUpdate | null {
    const count = samples.length;
    if (this.phaseFor(count) === "COLD") return null;
    if (count % this.settings.recomputeInterval !== 0) return null;
    if (count === this.lastRecomputeCount) return null;

    const update = computeThreshold(samples, this.settings);
    this.currentThreshold = update.thresholdMs;
    this.lastRecomputeCount = count;
    return update;
  }
}
