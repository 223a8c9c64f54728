/**
 * Vitest Global Setup
 *
 * Resets the environment config cache so that vi.stubEnv() calls made in a
 * test file are picked up by the config module on next access.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

// Keep pino quiet unless a run asks for logs
process.env.LOG_LEVEL ??= "silent";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
