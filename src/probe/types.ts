/**
 * Outcome of a single reachability probe.
 */
export interface ProbeResult {
  success: boolean;
  /** Round-trip time; present when success is true */
  latencyMs?: number;
  /** Reply line on success, failure description otherwise */
  rawMessage: string;
}

export interface Prober {
  probe(destination: string, timeoutMs: number): Promise<ProbeResult>;
}
