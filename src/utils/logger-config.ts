/**
 * Centralized Logger Configuration
 *
 * The console feed owns stdout, so diagnostic logs go to stderr as JSON.
 */

import pino from "pino";

export const LOGGER_NAME = "latency-sentinel";

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string): pino.LoggerOptions {
  return {
    name: LOGGER_NAME,
    level,
    serializers: {
      error: pino.stdSerializers.err,
    },
  };
}

/**
 * Destination for diagnostic logs (stderr, synchronous so nothing is lost on exit)
 */
export function createLogDestination(): pino.DestinationStream {
  return pino.destination({ dest: 2, sync: true });
}
