import pino from "pino";

export type LogLevel = pino.LevelWithSilent;

export const makeLogger = (
  level: LogLevel = "info",
  pretty = false,
): pino.Logger =>
  pretty
    ? pino({
        level,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l" },
        },
      })
    : pino({ level });
