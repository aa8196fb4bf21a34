import pino from "pino";

// Pretty print unless running in production or under the test runner
const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";
const transport =
  isProduction || isTest
    ? undefined
    : {
        target: "pino-pretty",
        options: {
          colorize: true,
          ignore: "pid,hostname",
          translateTime: "SYS:standard",
        },
      };

/**
 * Interface engine logger.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  transport,
});
