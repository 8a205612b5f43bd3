/**
 * Structured Logger with Winston
 *
 * Features:
 * - Multiple log levels (error, warn, info, debug)
 * - File logging with daily rotation
 * - Console output for development
 * - Structured JSON logs
 * - Context injection (service, symbol, tradeId, etc)
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  /** Service name (trader, backtest) */
  service: string;
  /** Log level */
  level?: LogLevel;
  /** Enable console output */
  console?: boolean;
  /** Enable file logging */
  file?: boolean;
  /** Log directory */
  logDir?: string;
  /** Drop every entry (tests) */
  silent?: boolean;
}

export interface LogContext {
  [key: string]: unknown;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'error' || value === 'warn' || value === 'info' || value === 'debug';
}

/**
 * Logger class with structured logging
 */
export class Logger {
  private logger: winston.Logger;
  readonly service: string;

  constructor(config: LoggerConfig, base?: winston.Logger) {
    this.service = config.service;
    this.logger = base ?? Logger.build(config);
  }

  private static build(config: LoggerConfig): winston.Logger {
    const fileEnabled = config.file === true && config.silent !== true;
    const logDir = config.logDir || path.join(process.cwd(), 'logs', config.service);
    if (fileEnabled) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    const logFormat = winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'service'] }),
      winston.format.json()
    );

    // Pretty print for dev
    const consoleFormat = winston.format.combine(
      winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? `\n${JSON.stringify(meta, null, 2)}` : '';
        return `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}${metaStr}`;
      })
    );

    const transports: winston.transport[] = [];

    if (config.console !== false && config.silent !== true) {
      transports.push(new winston.transports.Console({ format: consoleFormat }));
    }

    if (fileEnabled) {
      transports.push(
        new DailyRotateFile({
          filename: path.join(logDir, `${config.service}-%DATE%.log`),
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '14d',
          format: logFormat,
        })
      );

      // Error logs (separate file)
      transports.push(
        new DailyRotateFile({
          filename: path.join(logDir, `${config.service}-error-%DATE%.log`),
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '30d',
          level: 'error',
          format: logFormat,
        })
      );
    }

    return winston.createLogger({
      level: config.level || 'info',
      defaultMeta: { service: config.service },
      silent: config.silent === true,
      transports,
    });
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.logger.log(level, message, context);
  }

  /**
   * Create child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger({ service: this.service }, this.logger.child(context));
  }

  /**
   * Close logger and wait until every transport (rotating files included) has flushed
   */
  async close(): Promise<void> {
    const flushed = this.logger.transports.map(
      (transport) => new Promise<void>((resolve) => transport.once('finish', () => resolve()))
    );
    await new Promise<void>((resolve) => {
      this.logger.once('finish', () => resolve());
      this.logger.end();
    });
    await Promise.all(flushed);
  }
}

/**
 * Create a logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}

/**
 * Logger that drops everything, for tests and embedding
 */
export function createSilentLogger(service = 'test'): Logger {
  return new Logger({ service, silent: true, console: false, file: false });
}
