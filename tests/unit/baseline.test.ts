import { describe, it, expect } from "vitest";
import { estimateBaseline } from "../../src/monitor/baseline.js";

describe("estimateBaseline", () => {
  it("returns the value itself for 15 identical samples", () => {
    const result = estimateBaseline(Array.from({ length: 15 }, () => 37));
    expect(result).toEqual({
      trimmedMean: 37,
      trimmedJitter: 0,
      baseline: 37,
      trimCount: 2,
      retained: 11,
    });
  });

  it("trims a single outlier out of 15 samples", () => {
    const samples = [...Array.from({ length: 14 }, () => 10), 200];
    const result = estimateBaseline(samples);
    expect(result.trimmedMean).toBe(10);
    expect(result.trimmedJitter).toBe(0);
    expect(result.baseline).toBe(10);
  });

  it("drops floor(15%) from each end of the sorted samples", () => {
    // sorted: [1, 10, 10, 10, 12, 14, 500] -> trimCount 1 -> [10, 10, 10, 12, 14]
    const result = estimateBaseline([1, 10, 10, 12, 14, 10, 500]);
    expect(result.trimCount).toBe(1);
    expect(result.retained).toBe(5);
    expect(result.trimmedMean).toBeCloseTo(11.2, 10);
    expect(result.trimmedJitter).toBeCloseTo(1.6, 10);
    expect(result.baseline).toBeCloseTo(12.8, 10);
  });

  it("skips trimming for four or fewer samples", () => {
    const result = estimateBaseline([10, 20, 30, 40]);
    expect(result.trimCount).toBe(0);
    expect(result.retained).toBe(4);
    expect(result.trimmedMean).toBe(25);
    expect(result.trimmedJitter).toBeCloseTo(Math.sqrt(125), 10);
  });

  it("keeps every sample when 15% of n rounds down to zero", () => {
    const result = estimateBaseline([1, 2, 3, 4, 100]);
    expect(result.trimCount).toBe(0);
    expect(result.retained).toBe(5);
    expect(result.trimmedMean).toBe(22);
  });

  it("returns zeros for no samples", () => {
    expect(estimateBaseline([])).toEqual({
      trimmedMean: 0,
      trimmedJitter: 0,
      baseline: 0,
      trimCount: 0,
      retained: 0,
    });
  });

  it("does not reorder the caller's samples", () => {
    const samples = [30, 10, 20, 50, 40];
    estimateBaseline(samples);
    expect(samples).toEqual([30, 10, 20, 50, 40]);
  });
});
