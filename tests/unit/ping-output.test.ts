import { describe, it, expect } from "vitest";
import { parsePingOutput } from "../../src/probe/ping-output.js";

describe("parsePingOutput", () => {
  it("reads the reply line from Linux output", () => {
    const output = [
      "PING 192.0.2.1 (192.0.2.1) 56(84) bytes of data.",
      "64 bytes from 192.0.2.1: icmp_seq=1 ttl=57 time=12.3 ms",
      "",
      "--- 192.0.2.1 ping statistics ---",
      "1 packets transmitted, 1 received, 0% packet loss, time 0ms",
    ].join("\n");

    expect(parsePingOutput(output)).toEqual({
      latencyMs: 12.3,
      line: "64 bytes from 192.0.2.1: icmp_seq=1 ttl=57 time=12.3 ms",
    });
  });

  it("reads Windows replies with CRLF line endings", () => {
    const output = "\r\nPinging 192.0.2.1 with 32 bytes of data:\r\nReply from 192.0.2.1: bytes=32 time=8ms TTL=57\r\n";
    expect(parsePingOutput(output)).toEqual({
      latencyMs: 8,
      line: "Reply from 192.0.2.1: bytes=32 time=8ms TTL=57",
    });
  });

  it("takes the bound of a sub-millisecond Windows reply", () => {
    expect(parsePingOutput("Reply from 192.0.2.1: bytes=32 time<1ms TTL=57")?.latencyMs).toBe(1);
  });

  it("returns null when no reply arrived", () => {
    expect(parsePingOutput("Reply from 192.0.2.254: Destination host unreachable.")).toBeNull();
    expect(parsePingOutput("1 packets transmitted, 0 received, 100% packet loss, time 0ms")).toBeNull();
    expect(parsePingOutput("")).toBeNull();
  });
});
