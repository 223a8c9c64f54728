import { describe, it, expect, afterEach, beforeEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { ConsoleFileSink, MemorySink } from "../../src/output/sink.js";
import { setTestSink, type TelemetryShape } from "../../src/utils/telemetry.js";

const fixedNow = (): Date => new Date(2026, 0, 2, 3, 4, 5);

function captureStdout() {
  const chunks: string[] = [];
  return { chunks, writer: { write: (chunk: string) => chunks.push(chunk) } };
}

describe("ConsoleFileSink", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "sentinel-sink-"));
  });

  afterEach(async () => {
    setTestSink(null);
    await rm(dir, { recursive: true, force: true });
  });

  it("prints and appends timestamped lines", async () => {
    const logFile = path.join(dir, "session.txt");
    const out = captureStdout();
    const sink = new ConsoleFileSink({ logFile, stdout: out.writer, now: fixedNow });

    await sink.write("hello");
    await sink.write("world");

    expect(out.chunks).toEqual(["2026-01-02 03:04:05 - hello\n", "2026-01-02 03:04:05 - world\n"]);
    expect(await readFile(logFile, "utf8")).toBe(
      "2026-01-02 03:04:05 - hello\n2026-01-02 03:04:05 - world\n",
    );
    expect(sink.persistFailures).toBe(0);
  });

  it("keeps printing when the file cannot be written", async () => {
    const events: Array<{ event: string; data: TelemetryShape }> = [];
    setTestSink((event, data) => events.push({ event, data }));

    const out = captureStdout();
    const sink = new ConsoleFileSink({
      logFile: path.join(dir, "session.txt"),
      stdout: out.writer,
      now: fixedNow,
      append: async () => {
        throw new Error("disk full");
      },
    });

    await expect(sink.write("first")).resolves.toBeUndefined();
    await sink.write("second");

    expect(out.chunks).toEqual(["2026-01-02 03:04:05 - first\n", "2026-01-02 03:04:05 - second\n"]);
    expect(sink.persistFailures).toBe(2);
    expect(events).toEqual([
      { event: "sink.write_failed", data: { failed_writes: 1 } },
      { event: "sink.write_failed", data: { failed_writes: 2 } },
    ]);
  });

  it("writes only to stdout without a log file", async () => {
    const out = captureStdout();
    const sink = new ConsoleFileSink({ stdout: out.writer, now: fixedNow });
    await sink.write("console only");
    expect(out.chunks).toEqual(["2026-01-02 03:04:05 - console only\n"]);
  });
});

describe("MemorySink", () => {
  it("keeps messages without timestamps", async () => {
    const sink = new MemorySink();
    await sink.write("a");
    await sink.write("b");
    expect(sink.lines).toEqual(["a", "b"]);
  });
});
