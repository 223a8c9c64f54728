/**
 * Parsing of `ping` reply lines.
 *
 * Linux/macOS:  64 bytes from 1.1.1.1: icmp_seq=1 ttl=57 time=12.3 ms
 * Windows:      Reply from 1.1.1.1: bytes=32 time=12ms TTL=57
 *               Reply from 1.1.1.1: bytes=32 time<1ms TTL=57
 */

export interface ParsedPingReply {
  latencyMs: number;
  /** The reply line, trimmed */
  line: string;
}

const REPLY_LINE = /(bytes from|reply from)/i;
const TIME_FIELD = /time\s*([=<])\s*(\d+(?:\.\d+)?)\s*ms/i;

export function parsePingOutput(output: string): ParsedPingReply | null {
  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!REPLY_LINE.test(line)) continue;

    const match = TIME_FIELD.exec(line);
    if (!match) continue;

    const latencyMs = Number(match[2]);
    if (!Number.isFinite(latencyMs)) continue;

    return { latencyMs, line };
  }
  return null;
}
