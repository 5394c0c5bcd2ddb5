import pino from "pino";

type LogFn = (obj: object, msg?: string) => void;

export interface ILogger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

export const makeLogger = (
  level: pino.LevelWithSilent = "info",
  pretty = false,
): ILogger =>
  pino({
    level,
    ...(pretty
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "HH:MM:ss.l" },
          },
        }
      : {}),
  });
