import { pino, type Logger, type LoggerOptions } from "pino";

const loggerOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    service: "expiring-qr-mcp-server"
  },
  redact: {
    paths: [
      "authorization",
      "*.authorization",
      "contentBase64",
      "*.contentBase64",
      "brandingBase64",
      "*.brandingBase64"
    ],
    censor: "[REDACTED]"
  }
};

export type AppLogger = Logger;

export const appLogger: AppLogger = pino(loggerOptions);

export function createComponentLogger(component: string, parent: AppLogger = appLogger): AppLogger {
  return parent.child({ component });
}
