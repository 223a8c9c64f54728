/**
 * Session configuration
 *
 * Validated once before a session starts; any problem is fatal and the
 * probe loop never begins.
 */

import { z } from "zod";
import { ConfigError } from "../utils/errors.js";
import { DEFAULT_THRESHOLD_SETTINGS } from "../monitor/threshold-controller.js";
import { clampProbeTimeout, PROBE_TIMEOUT_MS } from "./timeouts.js";

const Destination = z
  .string({ required_error: "Destination is required" })
  .trim()
  .min(1, "Destination is required")
  .refine((val) => !val.startsWith("-"), "Destination must not start with '-'")
  .refine((val) => !/\s/.test(val), "Destination must not contain whitespace");

export const MonitorConfigSchema = z
  .object({
    destination: Destination,
    timeLimitSeconds: z.coerce.number().nonnegative().default(0),
    intervalMs: z.coerce.number().int().positive().default(1000),
    spikeMultiplierPercent: z.coerce
      .number()
      .positive()
      .default(DEFAULT_THRESHOLD_SETTINGS.multiplierPercent),
    recomputeInterval: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_THRESHOLD_SETTINGS.recomputeInterval),
    minThresholdMs: z.coerce
      .number()
      .nonnegative()
      .default(DEFAULT_THRESHOLD_SETTINGS.minThresholdMs),
    maxThresholdMs: z.coerce
      .number()
      .positive()
      .default(DEFAULT_THRESHOLD_SETTINGS.maxThresholdMs),
    initialThresholdMs: z.coerce
      .number()
      .nonnegative()
      .default(DEFAULT_THRESHOLD_SETTINGS.initialThresholdMs),
    warmupSamples: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_THRESHOLD_SETTINGS.warmupSamples),
    probeTimeoutMs: z.coerce.number().positive().transform(clampProbeTimeout).default(PROBE_TIMEOUT_MS),
    logFile: z.string().min(1).optional(),
    debug: z.boolean().default(false),
  })
  .refine((cfg) => cfg.minThresholdMs <= cfg.maxThresholdMs, {
    message: "minThresholdMs must not exceed maxThresholdMs",
    path: ["minThresholdMs"],
  });

export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;

/**
 * @throws ConfigError when the input cannot be used
 */
export function parseMonitorConfig(input: unknown): MonitorConfig {
  const result = MonitorConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError("Invalid monitor configuration", {
      validation_errors: result.error.flatten(),
    });
  }
  return result.data;
}
