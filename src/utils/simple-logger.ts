/**
 * Simple structured logger
 *
 * Wraps the shared pino logger from telemetry so callers outside the
 * session loop log to the same stderr destination. Every call passes
 * structured data first and a short message second.
 */

import { log as pinoLog } from "./telemetry.js";

export const logger = {
  info(data: Record<string, unknown>, msg: string): void {
    pinoLog.info(data, msg);
  },

  warn(data: Record<string, unknown>, msg: string): void {
    pinoLog.warn(data, msg);
  },
};
