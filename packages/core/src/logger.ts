/**
 * TaskMatch Structured Logger
 * JSON-formatted logging with levels and bound metadata
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogFormat = 'json' | 'text';

export interface LoggerConfig {
  level?: LogLevel;
  format?: LogFormat;
  output?: 'stdout' | 'stderr';
  serviceName?: string;
  /** Metadata merged into every entry (used by child loggers) */
  bindings?: LogMetadata;
}

export interface LogMetadata {
  [key: string]: unknown;
}

export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private outputName: 'stdout' | 'stderr';
  private serviceName: string;
  private bindings: LogMetadata;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? LogLevel.INFO;
    this.format = config.format ?? 'json';
    this.outputName = config.output ?? 'stdout';
    this.serviceName = config.serviceName ?? 'taskmatch-core';
    this.bindings = config.bindings ?? {};
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log(LogLevel.DEBUG, message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log(LogLevel.INFO, message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log(LogLevel.WARN, message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log(LogLevel.ERROR, message, metadata);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level && this.level !== LogLevel.SILENT;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const levelName = LogLevel[level];
    const merged = { ...this.bindings, ...metadata };
    const output = this.outputName === 'stderr' ? process.stderr : process.stdout;

    if (this.format === 'json') {
      const logEntry = {
        timestamp,
        level: levelName,
        service: this.serviceName,
        message,
        ...merged,
      };
      output.write(JSON.stringify(logEntry) + '\n');
    } else {
      const metaStr = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : '';
      output.write(`[${timestamp}] ${levelName} [${this.serviceName}] ${message}${metaStr}\n`);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  child(metadata: LogMetadata): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      output: this.outputName,
      serviceName: this.serviceName,
      bindings: { ...this.bindings, ...metadata },
    });
  }
}

/**
 * Parse a level name such as "debug" or "WARN"; unknown names yield undefined
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
    case 'none':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

/**
 * Build a logger from LOG_LEVEL and LOG_FORMAT
 */
export function createLoggerFromEnv(serviceName: string, env: NodeJS.ProcessEnv = process.env): Logger {
  return new Logger({
    serviceName,
    level: parseLogLevel(env.LOG_LEVEL) ?? LogLevel.INFO,
    format: env.LOG_FORMAT === 'text' ? 'text' : 'json',
  });
}

// Default logger instance
export const logger = createLoggerFromEnv('taskmatch-core');
