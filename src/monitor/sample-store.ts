export interface Sample {
  /** 1-based arrival order */
  readonly index: number;
  readonly latencyMs: number;
  readonly timestamp: Date;
}

/**
 * Append-only history of successful latency observations for one session.
 */
export class SampleStore {
  private readonly samples: Sample[] = [];
  private readonly latencies: number[] = [];

  get length(): number {
    return this.samples.length;
  }

  append(latencyMs: number, timestamp: Date): Sample {
    if (!Number.isFinite(latencyMs) || latencyMs < 0) {
      throw new RangeError(`Latency must be a non-negative finite number, got ${latencyMs}`);
    }
    const sample: Sample = Object.freeze({
      index: this.samples.length + 1,
      latencyMs,
      timestamp: new Date(timestamp.getTime()),
    });
    this.samples.push(sample);
    this.latencies.push(latencyMs);
    return sample;
  }

  /**
   * Live latencies in arrival order, not a copy. Later appends show through,
   * so callers read it within the current tick only.
   */
  view(): readonly number[] {
    return this.latencies;
  }

  all(): readonly Sample[] {
    return [...this.samples];
  }

  last(): Sample | undefined {
    return this.samples[this.samples.length - 1];
  }
}
