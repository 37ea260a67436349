/**
 * Logging via pino. Components receive a logger and derive a child per
 * component; library callers that pass none get a silent logger.
 */
import { pino, type Level, type Logger } from "pino";

export type LogLevel = Level | "silent";

export function createLogger(level: LogLevel = "info"): Logger {
  return pino({ name: "drive-import", level });
}

export const silentLogger: Logger = pino({ level: "silent" });
