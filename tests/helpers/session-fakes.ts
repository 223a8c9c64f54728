import type { Prober, ProbeResult } from "../../src/probe/types.js";
import type { Clock } from "../../src/monitor/session.js";

/**
 * Manual clock whose sleep advances time instantly.
 */
export class FakeTime implements Clock {
  private current: number;
  readonly sleeps: number[] = [];

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  sleep = async (ms: number): Promise<void> => {
    this.sleeps.push(ms);
    this.current += ms;
  };
}

/**
 * Prober that answers from a script indexed by attempt (0-based).
 */
export class ScriptedProber implements Prober {
  readonly calls: Array<{ destination: string; timeoutMs: number }> = [];

  constructor(private readonly script: (attempt: number) => ProbeResult | Error) {}

  async probe(destination: string, timeoutMs: number): Promise<ProbeResult> {
    const attempt = this.calls.length;
    this.calls.push({ destination, timeoutMs });
    const outcome = this.script(attempt);
    if (outcome instanceof Error) throw outcome;
    return outcome;
  }
}

export function reply(latencyMs: number, seq: number): ProbeResult {
  return {
    success: true,
    latencyMs,
    rawMessage: `64 bytes from 192.0.2.1: icmp_seq=${seq} ttl=57 time=${latencyMs} ms`,
  };
}
