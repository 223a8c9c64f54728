/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to the environment variables the monitor
 * reads. Per-session settings (destination, thresholds) live in
 * `./monitor.ts`; this module only supplies process-wide defaults.
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    if (lower === "true" || lower === "1") return true;
    return Boolean(val);
  });

/**
 * Optional positive number; empty strings count as unset
 */
const optionalPositive = z
  .union([z.string(), z.number(), z.undefined()])
  .transform((val, ctx) => {
    if (val === undefined || val === "") return undefined;
    const n = Number(val);
    if (!Number.isFinite(n) || n <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected a positive number, received "${val}"`,
      });
      return z.NEVER;
    }
    return n;
  });

const Environment = z.enum(["development", "test", "production"]);

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

const ConfigSchema = z.object({
  runtime: z.object({
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("warn"),
  }),

  // StatsD metrics (hot-shots); disabled unless a host is given
  metrics: z.object({
    host: z.string().optional(),
    port: z.coerce.number().int().positive().default(8125),
    prefix: z.string().default("latency_sentinel."),
  }),

  // Defaults for CLI flags that were not passed
  monitor: z.object({
    intervalMs: optionalPositive,
    spikeMultiplierPercent: optionalPositive,
    recomputeInterval: optionalPositive,
    logDir: z.string().optional(),
    debug: booleanString.default(false),
  }),

  testing: z.object({
    isVitest: booleanString.default(false),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    runtime: {
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
    },
    metrics: {
      host: env.STATSD_HOST || undefined,
      port: env.STATSD_PORT,
      prefix: env.STATSD_PREFIX,
    },
    monitor: {
      intervalMs: env.SENTINEL_INTERVAL_MS,
      spikeMultiplierPercent: env.SENTINEL_SPIKE_MULTIPLIER,
      recomputeInterval: env.SENTINEL_RECOMPUTE_INTERVAL,
      logDir: env.SENTINEL_LOG_DIR || undefined,
      debug: env.SENTINEL_DEBUG,
    },
    testing: {
      isVitest: env.VITEST,
    },
  };

  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error("Configuration validation failed:");
      console.error(JSON.stringify(error.issues, null, 2));
      throw new Error("Invalid configuration. Please check environment variables.");
    }
    throw error;
  }
}

/**
 * Lazy-initialized configuration using Proxy pattern
 *
 * Defers parsing until first property access so tests can set environment
 * variables before the config is parsed.
 */
let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

export const config: Config = new Proxy({} as Config, {
  get(_target, prop) {
    return Reflect.get(loadConfig(), prop);
  },

  ownKeys(_target) {
    return Reflect.ownKeys(loadConfig());
  },

  getOwnPropertyDescriptor(_target, prop) {
    return Reflect.getOwnPropertyDescriptor(loadConfig(), prop);
  },

  has(_target, prop) {
    return prop in loadConfig();
  },
});

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

export function isTest(): boolean {
  return config.runtime.nodeEnv === "test" || config.testing.isVitest;
}
