import winston from "winston";

const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function resolveLevel(raw: string | undefined): LogLevel {
  const match = LOG_LEVELS.find((level) => level === raw?.trim().toLowerCase());
  return match ?? "info";
}

/**
 * Process-wide logger.
 *
 * Everything goes to stderr: stdout is reserved for command output so that
 * `gpu-devbox ssh` and friends can be piped.
 */
export const logger = winston.createLogger({
  level: resolveLevel(process.env.LOG_LEVEL),
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
      return `${String(timestamp)} ${level} ${String(message)}${extra}`;
    }),
  ),
  transports: [new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] })],
});

/** Apply a level chosen after startup (config file or --log-level). */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
