import pino from "pino";
import { LOG_CONFIG } from "./config";

export interface ILogger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

export const makeLogger = (
  level: pino.LevelWithSilent = LOG_CONFIG.level,
  pretty: boolean = LOG_CONFIG.pretty,
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
