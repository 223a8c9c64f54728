import { mean, populationStdDev } from "./statistics.js";

/** Fraction dropped from each end of the sorted samples. */
export const TRIM_FRACTION = 0.15;

/** At or below this many samples nothing is trimmed. */
export const MIN_SAMPLES_FOR_TRIM = 4;

export interface BaselineEstimate {
  trimmedMean: number;
  trimmedJitter: number;
  /** trimmedMean + trimmedJitter */
  baseline: number;
  /** Samples dropped from each end */
  trimCount: number;
  /** Samples the estimate was computed over */
  retained: number;
}

/**
 * Robust latency baseline: mean and jitter over the sorted samples with the
 * lowest and highest 15% removed, so the spikes being hunted do not drag
 * the baseline up.
 */
export function estimateBaseline(samples: readonly number[]): BaselineEstimate {
  const n = samples.length;
  if (n === 0) {
    return { trimmedMean: 0, trimmedJitter: 0, baseline: 0, trimCount: 0, retained: 0 };
  }

  const sorted = [...samples].sort((a, b) => a - b);
  const trimCount = n <= MIN_SAMPLES_FOR_TRIM ? 0 : Math.floor(n * TRIM_FRACTION);
  const trimmed = sorted.slice(trimCount, n - trimCount);

  const trimmedJitter = populationStdDev(trimmed);
  const trimmedMean = trimmedJitter === 0 && trimmed.length > 0 ? trimmed[0] : mean(trimmed);

  return {
    trimmedMean,
    trimmedJitter,
    baseline: trimmedMean + trimmedJitter,
    trimCount,
    retained: trimmed.length,
  };
}
