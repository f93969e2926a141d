import { PinoLogger } from "@mastra/loggers";
import type { LogLevel } from "./config.js";
import type { Logger } from "./pipeline/types.js";

export function createLogger(level: LogLevel = "info"): Logger {
  return new PinoLogger({ name: "inbox-drafter", level });
}
