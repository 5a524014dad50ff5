import pino, { type Logger, type LevelWithSilent } from "pino";
import { env } from "./config";

export function createLogger(level: LevelWithSilent = env.LOG_LEVEL): Logger {
  return pino({
    name: "documentos-br",
    level,
    base: { env: env.NODE_ENV }
  });
}

export const logger = createLogger();
