import { describe, it, expect, vi, afterEach, beforeEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { main } from "../../src/cli.js";
import { ConfigError } from "../../src/utils/errors.js";
import { VERSION } from "../../src/version.js";
import { FakeTime, ScriptedProber, reply } from "../helpers/session-fakes.js";

describe("main", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints help and exits 0", async () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => undefined);
    await expect(main(["--help"])).resolves.toBe(0);
    expect(out).toHaveBeenCalledTimes(1);
    expect(String(out.mock.calls[0]?.[0])).toContain("Usage: latency-sentinel -d <destination> [options]");
  });

  it("prints the version", async () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => undefined);
    await expect(main(["--version"])).resolves.toBe(0);
    expect(out).toHaveBeenCalledWith(VERSION);
  });

  it("rejects a run without a destination before probing", async () => {
    await expect(main(["-t", "5"])).rejects.toBeInstanceOf(ConfigError);
    await expect(main(["-t", "5"])).rejects.toThrow("Invalid monitor configuration");
  });

  describe("with a log file that cannot be created", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), "sentinel-cli-"));
      await writeFile(path.join(dir, "blocker"), "not a directory");
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("still runs the session on the console", async () => {
      const out = vi.spyOn(console, "log").mockImplementation(() => undefined);
      const time = new FakeTime();
      const prober = new ScriptedProber((attempt) => reply(12, attempt + 1));
      const chunks: string[] = [];
      const logFile = path.join(dir, "blocker", "sub", "run.log");

      const code = await main(["-d", "192.0.2.1", "-t", "1", "-i", "500", "-l", logFile], {
        prober,
        clock: time,
        sleep: time.sleep,
        stdout: { write: (chunk: string) => chunks.push(chunk) },
      });

      expect(code).toBe(0);
      expect(prober.calls).toHaveLength(2);
      expect(out).toHaveBeenCalledWith("Log file: unavailable, console output only");
      expect(out.mock.calls.some(([line]) => String(line).startsWith("Log saved to:"))).toBe(false);
      expect(chunks[1]).toMatch(/ - 64 bytes from 192\.0\.2\.1: icmp_seq=1 ttl=57 time=12 ms\n$/);
      expect(chunks[chunks.length - 1]).toMatch(/ - Ping session ended\n$/);
    });
  });
});
