import { pino } from "pino";

const env = process.env.NODE_ENV;
const isTest = env === "test";
const isDev = env !== "production" && !isTest;

export const logger = pino({
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
