import { DEFAULT_THRESHOLD_SETTINGS } from "./threshold-controller.js";

export interface SpikeRecord {
  readonly timestamp: Date;
  readonly latencyMs: number;
  /** Threshold in force when the sample was classified */
  readonly thresholdMs: number;
  readonly rawMessage: string;
}

/**
 * A sample is a spike when enough history exists and it is strictly above
 * the current threshold.
 */
export function classify(
  latencyMs: number,
  sequenceLengthSoFar: number,
  currentThresholdMs: number,
  warmupSamples: number = DEFAULT_THRESHOLD_SETTINGS.warmupSamples,
): boolean {
  if (sequenceLengthSoFar < warmupSamples) return false;
  return latencyMs > currentThresholdMs;
}

export function createSpikeRecord(
  latencyMs: number,
  thresholdMs: number,
  rawMessage: string,
  timestamp: Date,
): SpikeRecord {
  return Object.freeze({
    timestamp: new Date(timestamp.getTime()),
    latencyMs,
    thresholdMs,
    rawMessage,
  });
}
