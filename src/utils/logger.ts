/**
 * Logger Module
 *
 * Leveled, component-tagged logging for the split/merge engines.
 * Writes to the console by default, or appends to a log file when one is
 * configured through createLogger().
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Log levels ordered by severity (lower = more severe)
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

/**
 * Logger interface defining the logging methods
 */
export interface Logger {
  error(component: string, message: string, meta?: object): void;
  warn(component: string, message: string, meta?: object): void;
  info(component: string, message: string, meta?: object): void;
  debug(component: string, message: string, meta?: object): void;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  /** Suppress console output (file output, if configured, is unaffected) */
  setSilentConsole(silent: boolean): void;
}

/**
 * Configuration options for the logger
 */
export interface LoggerConfig {
  /** Append log lines to this file instead of the console */
  logFile?: string;
  /** Initial log level (default: INFO) */
  level?: LogLevel;
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
};

class ConsoleFileLogger implements Logger {
  private level: LogLevel;
  private logFile: string | null;
  private silentConsole = false;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? LogLevel.INFO;
    this.logFile = config.logFile ?? null;

    if (this.logFile) {
      try {
        fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
      } catch (err) {
        console.error(`[Logger] Cannot prepare log file ${this.logFile}, using console`, err);
        this.logFile = null;
      }
    }
  }

  private format(level: LogLevel, component: string, message: string, meta?: object): string {
    let line = `[${new Date().toISOString()}] [${LEVEL_NAMES[level]}] [${component}] ${message}`;
    if (meta && Object.keys(meta).length > 0) {
      line += ` ${JSON.stringify(meta)}`;
    }
    return line;
  }

  private write(level: LogLevel, component: string, message: string, meta?: object): void {
    if (level > this.level) return;

    const line = this.format(level, component, message, meta);

    if (this.logFile) {
      try {
        fs.appendFileSync(this.logFile, line + '\n');
        return;
      } catch (err) {
        console.error('[Logger] Failed to write to log file:', err);
      }
    }

    if (this.silentConsole) return;

    switch (level) {
      case LogLevel.ERROR:
        console.error(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      default:
        // stdout is reserved for command output (--json)
        console.error(line);
        break;
    }
  }

  error(component: string, message: string, meta?: object): void {
    this.write(LogLevel.ERROR, component, message, meta);
  }

  warn(component: string, message: string, meta?: object): void {
    this.write(LogLevel.WARN, component, message, meta);
  }

  info(component: string, message: string, meta?: object): void {
    this.write(LogLevel.INFO, component, message, meta);
  }

  debug(component: string, message: string, meta?: object): void {
    this.write(LogLevel.DEBUG, component, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setSilentConsole(silent: boolean): void {
    this.silentConsole = silent;
  }
}

let loggerInstance: Logger | null = null;

/**
 * Read the log level from the environment.
 * Supports DEBUG=1, SPLITKEEPER_DEBUG=1, LOG_LEVEL=warn or SPLITKEEPER_LOG_LEVEL=warn.
 */
export function getLogLevelFromEnv(): LogLevel {
  const debug = process.env.SPLITKEEPER_DEBUG || process.env.DEBUG;
  if (debug === '1' || debug === 'true' || debug?.toLowerCase() === 'debug') {
    return LogLevel.DEBUG;
  }

  const logLevel = process.env.SPLITKEEPER_LOG_LEVEL || process.env.LOG_LEVEL;
  if (logLevel) {
    return parseLogLevel(logLevel);
  }

  return LogLevel.INFO;
}

/**
 * Replace the shared logger with one that appends to `logFile`.
 */
export function createLogger(logFile: string, config: Omit<LoggerConfig, 'logFile'> = {}): Logger {
  loggerInstance = new ConsoleFileLogger({
    level: config.level ?? getLogLevelFromEnv(),
    logFile,
  });
  return loggerInstance;
}

/**
 * Get the shared logger, creating a console logger on first use.
 */
export function getLogger(): Logger {
  if (!loggerInstance) {
    const level = getLogLevelFromEnv();
    loggerInstance = new ConsoleFileLogger({ level });

    if (level === LogLevel.DEBUG) {
      loggerInstance.debug('logger', 'Debug logging enabled via environment variable');
    }
  }
  return loggerInstance;
}

/**
 * Reset the logger instance (mainly for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}

/**
 * Parse a log level name. Unknown names fall back to INFO.
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'DEBUG':
      return LogLevel.DEBUG;
    default:
      return LogLevel.INFO;
  }
}
