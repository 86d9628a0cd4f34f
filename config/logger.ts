import pino from "pino";

const isTest = process.env.NODE_ENV === "test";
const isDev = process.env.NODE_ENV !== "production" && !isTest;

export const logger = pino({
  name: "judge-pipelines",
  transport: isDev
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          singleLine: true,
        },
      }
    : undefined,
  level: process.env.LOG_LEVEL ?? (isTest ? "silent" : "info"),
});
