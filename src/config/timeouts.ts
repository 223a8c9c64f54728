import { env } from "node:process";

const MIN_PROBE_TIMEOUT_MS = 100;
const MAX_PROBE_TIMEOUT_MS = 60_000; // 1m
const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

export function clampProbeTimeout(value: number): number {
  if (!Number.isFinite(value)) return DEFAULT_PROBE_TIMEOUT_MS;
  return Math.max(MIN_PROBE_TIMEOUT_MS, Math.min(MAX_PROBE_TIMEOUT_MS, value));
}

function parseTimeoutEnv(name: string, defaultMs: number): number {
  const raw = env[name];
  if (!raw) return defaultMs;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) return defaultMs;
  return n;
}

/** Upper bound for a single ping round trip before it counts as failed. */
export const PROBE_TIMEOUT_MS = clampProbeTimeout(
  parseTimeoutEnv("SENTINEL_PROBE_TIMEOUT_MS", DEFAULT_PROBE_TIMEOUT_MS),
);

/** Extra time allowed for the ping process itself to exit after its own timeout. */
export const PROBE_PROCESS_GRACE_MS = 1_000;
