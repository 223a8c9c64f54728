/**
 * Command-line argument parsing
 *
 * Produces raw (string) option values; numeric validation happens in
 * parseMonitorConfig so flags and environment defaults share one set of
 * rules.
 */

import { ConfigError } from "../utils/errors.js";

export const PROGRAM_NAME = "latency-sentinel";

export interface CliRunOptions {
  destination?: string;
  timeLimitSeconds?: string;
  logFile?: string;
  intervalMs?: string;
  spikeMultiplierPercent?: string;
  recomputeInterval?: string;
  minThresholdMs?: string;
  maxThresholdMs?: string;
  probeTimeoutMs?: string;
  debug?: boolean;
}

export type CliCommand =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "run"; options: CliRunOptions };

type ValueOption = Exclude<keyof CliRunOptions, "debug">;

const VALUE_FLAGS: Record<string, ValueOption> = {
  "-d": "destination",
  "--destination": "destination",
  "-t": "timeLimitSeconds",
  "--time-limit": "timeLimitSeconds",
  "-l": "logFile",
  "--log-file": "logFile",
  "-i": "intervalMs",
  "--interval": "intervalMs",
  "-s": "spikeMultiplierPercent",
  "--spike-multiplier": "spikeMultiplierPercent",
  "-r": "recomputeInterval",
  "--recompute-interval": "recomputeInterval",
  "--min-threshold": "minThresholdMs",
  "--max-threshold": "maxThresholdMs",
  "--timeout": "probeTimeoutMs",
};

/**
 * @throws ConfigError on an unknown option or a missing value
 */
export function parseArgs(argv: readonly string[]): CliCommand {
  const options: CliRunOptions = {};

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (arg === "-h" || arg === "--help") {
      return { kind: "help" };
    }
    if (arg === "-v" || arg === "--version") {
      return { kind: "version" };
    }
    if (arg === "--debug") {
      options.debug = true;
      continue;
    }

    // --flag=value
    const eq = arg.indexOf("=");
    const flag = arg.startsWith("--") && eq > 0 ? arg.slice(0, eq) : arg;
    const key = VALUE_FLAGS[flag];
    if (!key) {
      throw new ConfigError(`Unknown option: ${arg}`);
    }

    let value: string | undefined;
    if (flag !== arg) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i += 1;
    }
    if (value === undefined || value === "") {
      throw new ConfigError(`Option ${flag} requires a value`);
    }
    options[key] = value;
  }

  return { kind: "run", options };
}

export interface EnvironmentDefaults {
  intervalMs?: number;
  spikeMultiplierPercent?: number;
  recomputeInterval?: number;
  debug?: boolean;
}

/**
 * Raw monitor settings: flags win over environment defaults; anything left
 * unset falls through to the schema defaults.
 */
export function resolveMonitorInput(
  options: CliRunOptions,
  defaults: EnvironmentDefaults = {},
): Record<string, unknown> {
  const input: Record<string, unknown> = {
    destination: options.destination,
    timeLimitSeconds: options.timeLimitSeconds,
    logFile: options.logFile,
    intervalMs: options.intervalMs ?? defaults.intervalMs,
    spikeMultiplierPercent: options.spikeMultiplierPercent ?? defaults.spikeMultiplierPercent,
    recomputeInterval: options.recomputeInterval ?? defaults.recomputeInterval,
    minThresholdMs: options.minThresholdMs,
    maxThresholdMs: options.maxThresholdMs,
    probeTimeoutMs: options.probeTimeoutMs,
    debug: options.debug ?? defaults.debug ?? false,
  };

  for (const key of Object.keys(input)) {
    if (input[key] === undefined) delete input[key];
  }
  return input;
}

export function formatHelp(): string {
  return [
    `${PROGRAM_NAME} - continuous latency monitor with adaptive spike detection`,
    "",
    `Usage: ${PROGRAM_NAME} -d <destination> [options]`,
    "",
    "Required:",
    "  -d, --destination <target>     Target hostname or IP address",
    "",
    "Optional:",
    "  -t, --time-limit <seconds>     Time limit in seconds (0 = continuous, default: 0)",
    "  -l, --log-file <path>          Log file path (default: auto-generated)",
    "  -i, --interval <ms>            Ping interval in milliseconds (default: 1000)",
    "  -s, --spike-multiplier <pct>   Spike threshold as % of baseline (default: 200)",
    "  -r, --recompute-interval <n>   Successful pings between threshold updates (default: 10)",
    "      --min-threshold <ms>       Lowest spike threshold (default: 20)",
    "      --max-threshold <ms>       Highest spike threshold (default: 500)",
    "      --timeout <ms>             Per-ping timeout (default: 5000)",
    "      --debug                    Show threshold calculations",
    "  -v, --version                  Print the version",
    "  -h, --help                     Show this help message",
    "",
    "Environment:",
    "  SENTINEL_INTERVAL_MS, SENTINEL_SPIKE_MULTIPLIER, SENTINEL_RECOMPUTE_INTERVAL,",
    "  SENTINEL_PROBE_TIMEOUT_MS, SENTINEL_LOG_DIR, SENTINEL_DEBUG   defaults for the flags above",
    "  LOG_LEVEL                      Diagnostic log level on stderr (default: warn)",
    "  STATSD_HOST, STATSD_PORT       Send metrics to a StatsD agent",
    "",
    "Examples:",
    `  ${PROGRAM_NAME} -d 192.0.2.10`,
    `  ${PROGRAM_NAME} -d example.com -t 60 -i 2000`,
    `  ${PROGRAM_NAME} -d 192.168.1.1 -s 150 -t 300 --debug`,
  ].join("\n");
}
