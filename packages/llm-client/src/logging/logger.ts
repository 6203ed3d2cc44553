import pino from "pino";
import type { Logger as PinoLogger } from "pino";
import type { LoggingConfig } from "../config/env.js";

export type Logger = PinoLogger;

/** JSON logger with ISO timestamps; pretty-printed when `pretty` is set. */
export function createLogger(config: LoggingConfig, bindings?: Record<string, string>): Logger {
  const baseLogger = pino({
    name: config.name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(config.pretty && {
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    }),
  });

  if (bindings) {
    return baseLogger.child(bindings);
  }

  return baseLogger;
}

/** Logger that writes nothing. The default for adapters and the router. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
