import pino, { type Logger } from "pino";

// LOG_LEVEL wins, then DEBUG (any value) enables "debug", else "info".
const logLevel = process.env.LOG_LEVEL ??
  (process.env.DEBUG ? "debug" : "info");

const pretty = process.env.NODE_ENV !== "production" &&
  process.env.NODE_ENV !== "test";

// stdout belongs to the result list, so logs always go to stderr.
const logger: Logger = pretty
  ? pino({
    level: logLevel,
    transport: {
      target: "pino-pretty",
      options: {
        destination: 2,
        colorize: true,
        ignore: "pid,hostname",
        translateTime: "SYS:standard",
      },
    },
  })
  : pino({ level: logLevel }, pino.destination(2));

/**
 * Returns a child logger tagged with the calling module's name.
 */
export function getLogger(module: string): Logger {
  return logger.child({ module });
}

export default logger;
