import { execFile } from "node:child_process";
import { PROBE_PROCESS_GRACE_MS } from "../config/timeouts.js";
import { parsePingOutput } from "./ping-output.js";
import type { Prober, ProbeResult } from "./types.js";

export interface CommandResult {
  /** null when the process was killed */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs a command without a shell. Rejects only when the command cannot be
 * started; a non-zero exit resolves with its code.
 */
export type CommandRunner = (
  file: string,
  args: readonly string[],
  options: { timeoutMs: number },
) => Promise<CommandResult>;

export const runCommand: CommandRunner = (file, args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      [...args],
      { timeout: options.timeoutMs, windowsHide: true },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        if (typeof error.code === "number") {
          resolve({ exitCode: error.code, stdout, stderr });
          return;
        }
        if (error.killed) {
          resolve({ exitCode: null, stdout, stderr });
          return;
        }
        reject(error);
      },
    );
  });

/**
 * Single-echo arguments for the platform's ping. Linux takes the reply
 * timeout in whole seconds, macOS and Windows in milliseconds.
 */
export function buildPingArgs(
  platform: NodeJS.Platform,
  destination: string,
  timeoutMs: number,
): string[] {
  const wholeMs = Math.max(1, Math.ceil(timeoutMs));
  switch (platform) {
    case "win32":
      return ["-n", "1", "-w", String(wholeMs), destination];
    case "darwin":
      return ["-c", "1", "-W", String(wholeMs), destination];
    default:
      return ["-c", "1", "-W", String(Math.max(1, Math.ceil(timeoutMs / 1000))), destination];
  }
}

export interface SystemPingProberOptions {
  platform?: NodeJS.Platform;
  command?: string;
  run?: CommandRunner;
}

/**
 * Prober backed by the operating system's `ping` binary.
 */
export class SystemPingProber implements Prober {
  private readonly platform: NodeJS.Platform;
  private readonly command: string;
  private readonly run: CommandRunner;

  constructor(options: SystemPingProberOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.command = options.command ?? "ping";
    this.run = options.run ?? runCommand;
  }

  async probe(destination: string, timeoutMs: number): Promise<ProbeResult> {
    const args = buildPingArgs(this.platform, destination, timeoutMs);

    let result: CommandResult;
    try {
      result = await this.run(this.command, args, {
        timeoutMs: timeoutMs + PROBE_PROCESS_GRACE_MS,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { success: false, rawMessage: `${this.command} could not be started: ${message}` };
    }

    if (result.exitCode === null) {
      return { success: false, rawMessage: "Request timed out" };
    }

    const reply = parsePingOutput(result.stdout);
    if (result.exitCode === 0 && reply) {
      return { success: true, latencyMs: reply.latencyMs, rawMessage: reply.line };
    }

    if (result.exitCode === 0) {
      return { success: false, rawMessage: "Reply could not be parsed" };
    }

    return { success: false, rawMessage: "Request timed out or failed" };
  }
}
