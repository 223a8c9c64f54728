#!/usr/bin/env node
/**
 * latency-sentinel CLI
 *
 * Usage:
 *   latency-sentinel -d 192.0.2.10
 *   latency-sentinel -d example.com -t 60 -i 2000 --debug
 *
 * Ctrl+C stops the session and still prints the summary.
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { formatHelp, parseArgs, resolveMonitorInput } from "./cli/args.js";
import { config } from "./config/index.js";
import { parseMonitorConfig } from "./config/monitor.js";
import { SessionCoordinator, type SessionDependencies } from "./monitor/session.js";
import { prepareLogFile } from "./output/log-path.js";
import { ConsoleFileSink, type LineWriter } from "./output/sink.js";
import { SystemPingProber } from "./probe/system-ping.js";
import { formatErrorForConsole, getExitCodeForErrorCode, toErrorV1 } from "./utils/errors.js";
import { closeTelemetry } from "./utils/telemetry.js";
import { logger } from "./utils/simple-logger.js";
import { VERSION } from "./version.js";

/** Replaceable collaborators; the real ping, clock and stdout by default */
export interface MainOverrides extends Partial<Omit<SessionDependencies, "sink">> {
  stdout?: LineWriter;
}

export async function main(argv: readonly string[], overrides: MainOverrides = {}): Promise<number> {
  const command = parseArgs(argv);

  if (command.kind === "help") {
    console.log(formatHelp());
    return 0;
  }
  if (command.kind === "version") {
    console.log(VERSION);
    return 0;
  }

  const monitorConfig = parseMonitorConfig(resolveMonitorInput(command.options, config.monitor));
  const logFile = await prepareLogFile({
    logFile: monitorConfig.logFile,
    logDir: config.monitor.logDir,
    cwd: process.cwd(),
    now: new Date(),
  });

  console.log(`Starting ping to ${monitorConfig.destination}`);
  console.log(logFile ? `Log file: ${logFile}` : "Log file: unavailable, console output only");
  console.log(
    monitorConfig.timeLimitSeconds === 0
      ? "Running continuously (Press Ctrl+C to stop)"
      : `Time limit: ${monitorConfig.timeLimitSeconds} seconds`,
  );
  console.log(`Ping interval: ${monitorConfig.intervalMs}ms`);
  console.log(
    `Adaptive spike detection: ${monitorConfig.spikeMultiplierPercent}% multiplier ` +
      `(initial threshold: ${monitorConfig.initialThresholdMs}ms)`,
  );
  console.log("----------------------------------------");

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, "Stop requested");
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const session = new SessionCoordinator(monitorConfig, {
      prober: overrides.prober ?? new SystemPingProber(),
      sink: new ConsoleFileSink({ logFile, stdout: overrides.stdout }),
      clock: overrides.clock,
      sleep: overrides.sleep,
    });
    await session.run(controller.signal);
    if (logFile) {
      console.log(`Log saved to: ${logFile}`);
    }
    return 0;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2))
    .catch((error: unknown) => {
      const report = toErrorV1(error);
      console.error(formatErrorForConsole(report));
      if (report.code === "BAD_INPUT") {
        console.error("");
        console.error(formatHelp());
      }
      return getExitCodeForErrorCode(report.code);
    })
    .then(async (code) => {
      await closeTelemetry();
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 2;
    });
}
