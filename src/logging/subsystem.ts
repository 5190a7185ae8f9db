import type { Logger } from "pino";
import { logger } from "./logger.js";

export type SubsystemLogger = Logger;

/** Child logger tagged with the subsystem that emits the line. */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  return logger.child({ subsystem });
}
