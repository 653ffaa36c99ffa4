import winston from "winston";

export type LogLevel = "error" | "warn" | "info" | "debug" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug", "silent"];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** One JSON object per line; metadata is flattened next to the message. */
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DDTHH:mm:ss.SSSZ" }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const entry: Record<string, unknown> = { timestamp, level, message };
    for (const [key, value] of Object.entries(meta)) {
      entry[key] = value;
    }
    return JSON.stringify(entry);
  })
);

function initialLevel(): LogLevel {
  const fromEnv = process.env.LISTEDIT_LOG_LEVEL;
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : "warn";
}

const consoleTransport = new winston.transports.Console({
  stderrLevels: ["error", "warn", "info", "debug"]
});

const winstonLogger = winston.createLogger({
  level: "warn",
  format: logFormat,
  transports: [consoleTransport],
  exitOnError: false
});

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

export function setLogLevel(level: LogLevel): void {
  if (level === "silent") {
    winstonLogger.silent = true;
    return;
  }
  winstonLogger.silent = false;
  winstonLogger.level = level;
}

setLogLevel(initialLevel());

/**
 * Shared logger for every listedit package.
 *
 * @example
 * ```typescript
 * logger.debug("filter submitted", { query, start, end });
 * logger.warn("suggestion source failed", { query, error: err.message });
 * ```
 */
export const logger: Logger = {
  error(message, context) {
    winstonLogger.error(message, context ?? {});
  },
  warn(message, context) {
    winstonLogger.warn(message, context ?? {});
  },
  info(message, context) {
    winstonLogger.info(message, context ?? {});
  },
  debug(message, context) {
    winstonLogger.debug(message, context ?? {});
  }
};
