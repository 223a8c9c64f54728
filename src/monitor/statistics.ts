/**
 * Latency statistics
 *
 * Pure helpers over plain arrays of millisecond values. Jitter is the
 * population standard deviation (divide by n).
 */

export type JitterQuality = "Low" | "Moderate" | "High";

export interface Statistics {
  count: number;
  min: number;
  max: number;
  mean: number;
  /** null when there is a single sample */
  jitter: number | null;
  jitterQuality: JitterQuality | null;
}

const LOW_JITTER_MAX_MS = 2;
const MODERATE_JITTER_MAX_MS = 10;

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Population standard deviation; 0 for fewer than two values.
 */
export function populationStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;

  let min = values[0];
  let max = values[0];
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  if (min === max) return 0;

  const avg = mean(values);
  let squares = 0;
  for (const v of values) {
    const diff = v - avg;
    squares += diff * diff;
  }
  return Math.sqrt(squares / values.length);
}

export function classifyJitter(jitter: number): JitterQuality {
  if (jitter <= LOW_JITTER_MAX_MS) return "Low";
  if (jitter <= MODERATE_JITTER_MAX_MS) return "Moderate";
  return "High";
}

export function computeStatistics(samples: readonly number[]): Statistics | null {
  if (samples.length === 0) return null;

  let min = samples[0];
  let max = samples[0];
  for (const v of samples) {
    if (v < min) min = v;
    if (v > max) max = v;
  }

  if (samples.length === 1) {
    return { count: 1, min, max, mean: min, jitter: null, jitterQuality: null };
  }

  // Identical samples: skip the float sum so mean is exact and jitter is 0
  const avg = min === max ? min : mean(samples);
  const jitter = populationStdDev(samples);

  return {
    count: samples.length,
    min,
    max,
    mean: avg,
    jitter,
    jitterQuality: classifyJitter(jitter),
  };
}
