import pino from "pino";

import type { RunLogger } from "../../src/logger.js";

export function silentLogger(): RunLogger {
  return pino({ level: "silent" });
}
