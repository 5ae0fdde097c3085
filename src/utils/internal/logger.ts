/**
 * @fileoverview Winston-backed logger singleton using syslog levels.
 * Console output always goes to stderr so stdout stays free for the host
 * application. When a logs directory is configured, JSON lines are also
 * written to `error.log` and `combined.log`.
 * @module src/utils/internal/logger
 */

import path from "path";
import winston from "winston";
import { config, type LogLevel } from "../../config/index.js";
import type { RequestContext } from "./requestContext.js";

type LogContext = RequestContext | Record<string, unknown>;

const syslogLevels = winston.config.syslog.levels;

const serializeError = (error: Error): Record<string, unknown> => {
  const serialized: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if ("code" in error) {
    serialized.code = error.code;
  }
  return serialized;
};

const consoleFormat = winston.format.printf(
  ({ level, message, timestamp, ...meta }) => {
    const metaString = Object.keys(meta).length
      ? ` ${JSON.stringify(meta)}`
      : "";
    return `${String(timestamp)} ${level}: ${String(message)}${metaString}`;
  },
);

export class Logger {
  private static instance: Logger | undefined;
  private readonly winstonLogger: winston.Logger;

  private constructor(level: LogLevel, logsPath: string | null) {
    const fileTransports = logsPath
      ? [
          new winston.transports.File({
            filename: path.join(logsPath, "error.log"),
            level: "error",
            maxsize: 5 * 1024 * 1024,
            maxFiles: 3,
          }),
          new winston.transports.File({
            filename: path.join(logsPath, "combined.log"),
            maxsize: 10 * 1024 * 1024,
            maxFiles: 5,
          }),
        ]
      : [];

    this.winstonLogger = winston.createLogger({
      levels: syslogLevels,
      level,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
      ),
      transports: [
        new winston.transports.Console({
          stderrLevels: Object.keys(syslogLevels),
          format: winston.format.combine(
            winston.format.timestamp(),
            consoleFormat,
          ),
        }),
        ...fileTransports,
      ],
    });
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(config.logLevel, config.logsPath);
    }
    return Logger.instance;
  }

  public debug(message: string, context?: LogContext): void {
    this.winstonLogger.log("debug", message, context);
  }

  public info(message: string, context?: LogContext): void {
    this.winstonLogger.log("info", message, context);
  }

  public warning(message: string, context?: LogContext): void {
    this.winstonLogger.log("warning", message, context);
  }

  /**
   * Logs at `error`. Accepts either an error followed by a context, or a
   * context alone.
   */
  public error(
    message: string,
    errorOrContext?: Error | LogContext,
    context?: LogContext,
  ): void {
    if (errorOrContext instanceof Error) {
      this.winstonLogger.log("error", message, {
        ...context,
        error: serializeError(errorOrContext),
      });
      return;
    }
    this.winstonLogger.log("error", message, errorOrContext);
  }
}

export const logger = Logger.getInstance();
