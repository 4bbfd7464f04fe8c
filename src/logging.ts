import pino from "pino";

export interface ILogger {
  trace: pino.LogFn;
  debug: pino.LogFn;
  info: pino.LogFn;
  warn: pino.LogFn;
  error: pino.LogFn;
}

export const makeLogger = (
  level: pino.LevelWithSilent = "info",
  pretty = false,
): ILogger =>
  pino({
    level,
    base: undefined,
    ...(pretty
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "HH:MM:ss.l" },
          },
        }
      : {}),
  });
