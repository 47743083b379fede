import winston, { format } from "winston";

const defaultLogLevel = process.env.LOG_LEVEL || "info";

const logger = winston.createLogger({
  level: defaultLogLevel,
  format: format.json(),
  silent: process.env.NODE_ENV === "test",
  transports: [],
});

// Outside production, log to the console with the format:
// `${message}` or the pretty-printed object when a message is structured
if (process.env.NODE_ENV !== "production") {
  logger.add(
    new winston.transports.Console({
      format: format.combine(
        format.printf(({ message }) => {
          if (typeof message === "object") {
            return JSON.stringify(message, null, 2);
          }
          return String(message);
        }),
        format.colorize(),
        format.timestamp()
      ),
    })
  );
}

export type Logger = winston.Logger;

/**
 * A logger that drops everything, for callers that want the engine quiet.
 */
export function createSilentLogger(): Logger {
  return winston.createLogger({ silent: true, transports: [] });
}

export { logger };
