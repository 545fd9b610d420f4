import { appendFileSync, existsSync, mkdirSync, readdirSync, statSync, unlinkSync } from 'fs';
import { join } from 'path';
import type { LogLevelName } from '../../lib/env-config.js';

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR'
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR
};

export type LogContext = Record<string, unknown>;

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * What services need from a logger
 */
export interface StructuredLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
}

/**
 * Discards everything; default for services constructed without a logger
 */
export const silentLogger: StructuredLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

export interface LoggerOptions {
  logDir: string;
  level?: LogLevelName;

  /** Echo entries to stderr as well */
  console?: boolean;
}

/**
 * JSON Lines logger for nvidia-driver-check
 */
export class Logger implements StructuredLogger {
  private readonly logDir: string;
  private readonly logFile: string;
  private readonly minLevel: LogLevel;
  private readonly enableConsole: boolean;
  private fileWritable = true;

  constructor(options: LoggerOptions) {
    this.logDir = options.logDir;
    this.minLevel = LEVEL_BY_NAME[options.level ?? 'info'];
    this.enableConsole = options.console ?? false;

    try {
      if (!existsSync(this.logDir)) {
        mkdirSync(this.logDir, { recursive: true });
      }
    } catch {
      // Read-only home or similar: keep running, console echo still works
      this.fileWritable = false;
    }

    const timestamp = new Date().toISOString().split('T')[0];
    this.logFile = join(this.logDir, `driver-check-${timestamp}.jsonl`);
  }

  /**
   * Logs a debug message
   */
  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  /**
   * Logs an info message
   */
  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  /**
   * Logs a warning message
   */
  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  /**
   * Logs an error message
   */
  error(message: string, error?: unknown, context?: LogContext): void {
    const entry = this.createEntry(LogLevel.ERROR, message, context);

    if (error instanceof Error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack
      };
    } else if (error !== undefined) {
      entry.error = { name: 'Error', message: String(error) };
    }

    this.writeLog(entry);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.writeLog(this.createEntry(level, message, context));
  }

  private createEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message
    };
    if (context) {
      entry.context = context;
    }
    return entry;
  }

  private writeLog(entry: LogEntry): void {
    if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    if (this.fileWritable) {
      try {
        appendFileSync(this.logFile, JSON.stringify(entry) + '\n');
      } catch (error) {
        this.fileWritable = false;
        console.error('Failed to write log:', error);
      }
    }

    if (this.enableConsole) {
      this.writeToConsole(entry);
    }
  }

  /**
   * Console goes to stderr so it never interleaves with the report on stdout
   */
  private writeToConsole(entry: LogEntry): void {
    const prefix = `[${entry.timestamp}] [${entry.level}]`;
    const details = entry.error ?? entry.context;
    if (details) {
      console.error(`${prefix} ${entry.message}`, details);
    } else {
      console.error(`${prefix} ${entry.message}`);
    }
  }

  /**
   * Gets log file path
   */
  getLogFile(): string {
    return this.logFile;
  }

  /**
   * Cleans old log files (keeps last 7 days)
   */
  static cleanOldLogs(logDir: string, daysToKeep: number = 7): number {
    if (!existsSync(logDir)) return 0;

    const cutoffTime = Date.now() - daysToKeep * 24 * 60 * 60 * 1000;
    let removed = 0;

    for (const file of readdirSync(logDir)) {
      if (!file.endsWith('.jsonl')) continue;
      const path = join(logDir, file);
      try {
        if (statSync(path).mtime.getTime() < cutoffTime) {
          unlinkSync(path);
          removed++;
        }
      } catch (error) {
        console.error(`Failed to clean log file ${path}:`, error);
      }
    }

    return removed;
  }
}
