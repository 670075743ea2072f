import pino from "pino";
import type { Logger } from "pino";
import type { ServiceConfig } from "./config.js";

export function createLogger(config: Pick<ServiceConfig, "LOG_LEVEL">): Logger {
  return pino({
    name: "hydrant_pipeline",
    level: config.LOG_LEVEL,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

export function withRunId(logger: Logger, runId: string): Logger {
  return logger.child({ runId });
}
