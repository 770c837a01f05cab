import pino, { type Logger } from "pino";
import { runtimeConfig } from "../config.js";

const isDevelopment = process.env.NODE_ENV === "development";

export const logger: Logger = pino({
  level: runtimeConfig.logLevel,
  transport: isDevelopment
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss Z",
          ignore: "pid,hostname",
          destination: 2,
        },
      }
    : undefined,
  base: {
    service: "stock-reconciler",
    env: process.env.NODE_ENV,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    error: pino.stdSerializers.err,
  },
}, isDevelopment ? undefined : pino.destination(2));

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
