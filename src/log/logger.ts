// src/log/logger.ts
//
// pino loggers for the jobs. Pretty output in development, JSON otherwise.
//
//   const log = createLogger("worker");
//   log.warn({ memberId, status }, "stats request failed");

import pino from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL || "info";
const NODE_ENV = process.env.NODE_ENV || "development";

export function createLogger(name: string): pino.Logger {
  return pino({
    name: `egg-hunt:${name}`,
    level: LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    transport:
      NODE_ENV === "development"
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          }
        : undefined,
  });
}

export type { Logger } from "pino";
