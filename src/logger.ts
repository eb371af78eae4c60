/**
 * Logging setup.
 */

import winston from "winston";

export type Logger = winston.Logger;

export interface LoggerOptions {
  level?: string;
  name: string;
  logFile?: string;
}

export function createLogger(options: LoggerOptions): Logger {
  const { level = "info", name, logFile } = options;

  const transports: winston.transport[] = [new winston.transports.Console()];

  if (logFile) {
    transports.push(
      new winston.transports.File({
        filename: logFile,
        maxsize: 10485760, // 10MB
        maxFiles: 5,
      })
    );
  }

  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
        return `${String(timestamp)} ${level.toUpperCase()} [${name}] ${String(message)}${metaStr}`;
      })
    ),
    transports,
  });
}

/** Logger that drops everything; the default when a component gets none. */
export function createSilentLogger(): Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console({ silent: true })],
  });
}
