import { pino, type Level, type Logger } from "pino";

export type LogLevel = Level | "silent";

export function createLogger(options: { level: LogLevel }): Logger {
  return pino({
    name: "purpleair-client",
    level: options.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
