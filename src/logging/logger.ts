/**
 * Logging
 *
 * One winston logger per process. Components take a child bound to their
 * name, so every line reads: LEVEL timestamp [component] message
 * Output goes to stderr; stdout belongs to the console narration.
 */

import winston from "winston";

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type { Logger } from "winston";

export interface LoggerOptions {
  level?: LogLevel;
  silent?: boolean;
}

const textFormat = winston.format.printf((info) => {
  const level = info.level.toUpperCase().padStart(5);
  const component = typeof info["component"] === "string" ? ` [${info["component"]}]` : "";
  const timestamp = typeof info["timestamp"] === "string" ? info["timestamp"] : new Date().toISOString();
  return `${level} ${timestamp}${component} ${String(info.message)}`;
});

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  return winston.createLogger({
    level: options.level ?? "info",
    silent: options.silent ?? false,
    format: winston.format.combine(winston.format.timestamp(), textFormat),
    transports: [
      new winston.transports.Console({
        stderrLevels: [...LOG_LEVELS],
      }),
    ],
  });
}

/**
 * Logger that drops everything. Used by tests and library callers that do
 * not pass one.
 */
export function createSilentLogger(): winston.Logger {
  return createLogger({ silent: true });
}

export function componentLogger(logger: winston.Logger, component: string): winston.Logger {
  return logger.child({ component });
}
