import pino from "pino";

export type { Logger } from "pino";

const redactionPaths = [
  "*.headers.authorization",
  "*.authorization",
  "*.password",
  "*.auth.password",
  "*.SHELLY_PASSWORD"
];

const isTest = process.env.NODE_ENV === "test";

const pretty =
  process.env.NODE_ENV !== "production" && !isTest
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname"
        }
      }
    : undefined;

export const logger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? "silent" : "info"),
  redact: { paths: redactionPaths, censor: "[REDACTED]" },
  ...(pretty ? { transport: pretty } : {})
});
