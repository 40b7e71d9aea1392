import pino from "pino";
import path from "node:path";
import fs from "node:fs";
import pretty from "pino-pretty";
import os from "node:os";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Logger Service - Singleton pattern implementation
 * Provides centralized logging with file and console output
 */
class LoggerService {
  private static instance: LoggerService | null = null;
  private logger: pino.Logger;
  private logsDir: string;
  private logFile: string;

  private constructor() {
    this.logsDir = this.getLogsDir();
    this.ensureLogsDir();
    this.logFile = path.join(this.logsDir, "processor.log");
    this.logger = this.createLogger();
  }

  /**
   * Get the singleton instance
   */
  static getInstance(): LoggerService {
    if (!LoggerService.instance) {
      LoggerService.instance = new LoggerService();
    }
    return LoggerService.instance;
  }

  /**
   * Reset instance (for testing only)
   */
  static resetInstance(): void {
    LoggerService.instance = null;
  }

  /**
   * Logs live in ~/.focus-sentinel/logs unless FOCUS_SENTINEL_LOG_DIR is set
   */
  private getLogsDir(): string {
    return process.env.FOCUS_SENTINEL_LOG_DIR ?? path.join(os.homedir(), ".focus-sentinel", "logs");
  }

  private ensureLogsDir(): void {
    if (!fs.existsSync(this.logsDir)) {
      fs.mkdirSync(this.logsDir, { recursive: true });
    }
  }

  private resolveLevel(): LogLevel {
    const fromEnv = process.env.LOG_LEVEL;
    if (isLogLevel(fromEnv)) {
      return fromEnv;
    }
    return process.env.NODE_ENV === "production" ? "info" : "debug";
  }

  /**
   * Create logger instance with file and console streams
   */
  private createLogger(): pino.Logger {
    // stderr: stdout carries the feedback stream
    const prettyStream = pretty({
      destination: 2,
      colorize: true,
      translateTime: "HH:MM:ss",
      ignore: "pid,hostname,app,level",
      messageFormat: (log, messageKey) => {
        const msg = log[messageKey];
        const modulePrefix = log.module ? `[${String(log.module)}] ` : "";
        return `${modulePrefix}${String(msg)}`;
      },
    });

    const filePrettyStream = pretty({
      colorize: false,
      translateTime: "SYS:standard",
      destination: this.logFile,
      sync: false,
      ignore: "pid,hostname,app,logFile,module",
      singleLine: true,
      messageFormat: (log, messageKey) => {
        const msg = log[messageKey];
        const modulePrefix = log.module ? `[${String(log.module)}] ` : "";
        return `${modulePrefix}${String(msg)}`;
      },
    });

    const streams = [{ stream: filePrettyStream }, { stream: prettyStream }];

    return pino(
      {
        level: this.resolveLevel(),
        base: {
          pid: process.pid,
          app: "focus-sentinel",
        },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.multistream(streams)
    );
  }

  /**
   * Get the pino logger instance
   * @param name - Optional module name for child logger
   */
  getLogger(name?: string): pino.Logger {
    if (name) {
      return this.logger.child({ module: name });
    }
    return this.logger;
  }

  getLogFile(): string {
    return this.logFile;
  }
}

/**
 * Initialize logger - call once at process start
 */
export function initializeLogger(): pino.Logger {
  const service = LoggerService.getInstance();
  const logger = service.getLogger();
  logger.info({ logFile: service.getLogFile() }, "Logger initialized");
  return logger;
}

/**
 * Get the logger instance (convenience function)
 * @param name - Optional module name for child logger
 */
export function getLogger(name?: string): pino.Logger {
  return LoggerService.getInstance().getLogger(name);
}

export function resetLogger(): void {
  LoggerService.resetInstance();
}

export type Logger = pino.Logger;
