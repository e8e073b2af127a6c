import pino, { type Logger } from "pino";
import type { LoggingConfig } from "../config/env.js";

export type { Logger } from "pino";

// stdout carries the MCP stdio transport, so logs always go to stderr.
const STDERR_FD = 2;

export function createLogger(config: LoggingConfig): Logger {
  if (config.pretty) {
    return pino({
      level: config.level,
      base: undefined,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          destination: STDERR_FD,
        },
      },
    });
  }

  return pino(
    {
      level: config.level,
      base: undefined,
    },
    pino.destination(STDERR_FD),
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
