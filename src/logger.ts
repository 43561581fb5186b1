import { pino, type Logger } from "pino";
import type { LogLevel } from "./types.js";

export type { Logger };

const rootLogger = pino({
  name: "voice-gateway",
  level: process.env.LOG_LEVEL ?? "info",
});

/** Child of the process-wide logger, e.g. `createLogger({ component: "server" })`. */
export function createLogger(bindings: Record<string, unknown>): Logger {
  return rootLogger.child(bindings);
}

export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
}

/** Logger that drops everything. Used by tests and embedders that bring their own. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
