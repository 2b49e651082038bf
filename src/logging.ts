import pino from "pino";

export interface ILogger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

export type LogLevel = pino.LevelWithSilent;

export const makeLogger = (
  level: LogLevel = "info",
  opts: { pretty?: boolean } = {},
): ILogger =>
  pino({
    level,
    ...(opts.pretty
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "HH:MM:ss.l" },
          },
        }
      : {}),
  });

export const silentLogger: ILogger = pino({ level: "silent" });
