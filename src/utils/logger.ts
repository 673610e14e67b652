import pino from "pino";

const isProduction = process.env.NODE_ENV === "production";
// node --test sets NODE_TEST_CONTEXT in every test file process
const isTest = process.env.NODE_ENV === "test" || process.env.NODE_TEST_CONTEXT !== undefined;

const level = process.env.LOG_LEVEL ?? (isTest ? "silent" : isProduction ? "info" : "debug");

// Token-bearing fields never reach the log sink
const REDACT_PATHS = ["token", "*.token", "header.token", "*.header.token", "headers.authorization"];

export const logger = pino({
  level,
  redact: {
    paths: REDACT_PATHS,
    censor: "[REDACTED]",
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(process.env.LOG_PRETTY === "true" && {
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss.l",
        ignore: "pid,hostname",
      },
    },
  }),
});

export type Logger = pino.Logger;

/**
 * Child logger tagged with the owning component
 */
export const createLogger = (component: string): Logger => logger.child({ component });

export default logger;
