/**
 * Vitest Global Setup
 *
 * Runs before each test file. Resets the config cache so vi.stubEnv() calls
 * are picked up by the config module, and keeps the logger quiet.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

// The logger reads its level once, when telemetry is first imported
process.env.LOG_LEVEL ??= "silent";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
