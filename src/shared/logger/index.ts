import { config } from "../config";

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  level: string;
  json: boolean;
}

export interface RequestLogContext {
  method: string;
  url: string;
  ip?: string;
  principalId?: string;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly json: boolean;

  constructor(options: LoggerOptions) {
    this.level = this.parseLogLevel(options.level);
    this.json = options.json;
  }

  private parseLogLevel(level: string): LogLevel {
    switch (level.toLowerCase()) {
      case "error":
        return LogLevel.ERROR;
      case "warn":
        return LogLevel.WARN;
      case "info":
        return LogLevel.INFO;
      case "debug":
        return LogLevel.DEBUG;
      default:
        return LogLevel.INFO;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return level <= this.level;
  }

  formatMessage(level: string, message: string, meta?: LogMeta): string {
    const timestamp = new Date().toISOString();
    if (this.json) {
      return JSON.stringify({ timestamp, level, message, ...meta });
    }
    const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
    return `[${timestamp}] ${level}: ${message}${metaStr}`;
  }

  error(message: string, meta?: LogMeta): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage("ERROR", message, meta));
    }
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage("WARN", message, meta));
    }
  }

  info(message: string, meta?: LogMeta): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.info(this.formatMessage("INFO", message, meta));
    }
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.debug(this.formatMessage("DEBUG", message, meta));
    }
  }

  // Specialized logging methods
  logError(error: Error, context?: RequestLogContext): void {
    this.error("Error occurred", {
      error: error.message,
      stack: error.stack,
      ...context,
    });
  }

  logAuth(action: string, principalId?: string, details?: LogMeta): void {
    this.info("Authentication event", {
      action,
      principalId,
      ...details,
    });
  }

  logDecision(
    decision: { isAllowed: boolean; decisionSource: string; reason: string },
    details?: LogMeta,
  ): void {
    this.debug("Authorization decision", {
      allowed: decision.isAllowed,
      source: decision.decisionSource,
      reason: decision.reason,
      ...details,
    });
  }
}

export const logger = new Logger({
  level: config.logLevel,
  json: config.jsonLogFormat,
});
