import pino, { type Logger, type LoggerOptions } from "pino"
import { Config } from "../config"

const options: LoggerOptions = {
  level: Config.LOG_LEVEL,
  ...(Config.LOG_PRETTY
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            singleLine: true,
          },
        },
      }
    : {}),
}

export const logger: Logger = pino(options)
export const createLogger = (bindings: Record<string, unknown>): Logger => logger.child(bindings)
