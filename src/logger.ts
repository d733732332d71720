import pino, { type LoggerOptions } from "pino";

import { isDev, type Env } from "./config/env";

export function buildLoggerOptions(env: Env = process.env): LoggerOptions {
  const dev = isDev(env);
  return {
    level: env.LOG_LEVEL ?? (dev ? "debug" : "info"),
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(dev && env.PINO_PRETTY === "1"
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              singleLine: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        }
      : {}),
  };
}
