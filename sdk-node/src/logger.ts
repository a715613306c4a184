import { pino, type Logger } from "pino";

/**
 * Default SDK logger. Silent unless DOCSERVE_LOG_LEVEL is set.
 */
export function createLogger(): Logger {
  return pino({
    name: "docserve-node",
    level: process.env.DOCSERVE_LOG_LEVEL ?? "silent",
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** Shared by every client built without a logger of its own. */
export const logger: Logger = createLogger();
