/**
 * Centralized Logger Service
 * Uses Winston with console and optional file transports
 */

import winston from 'winston';
import type Transport from 'winston-transport';
import { loadLoggingConfig } from '../config';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Custom format for console output
const consoleFormat = printf(({ level, message, timestamp, component, ...meta }) => {
  const metaStr = Object.keys(meta).length > 0 ? JSON.stringify(meta) : '';
  const componentStr = component ? `[${component}]` : '';
  return `${timestamp} ${level} ${componentStr} ${message} ${metaStr}`;
});

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  component: string;
  enableConsole?: boolean;
  enableFile?: boolean;
  logFilePath?: string;
  /** Defaults to LOG_LEVEL */
  logLevel?: string;
  /** Mute every transport; defaults to TICKSCRIPT_LOG_SILENT */
  silent?: boolean;
}

export class Logger {
  private logger: winston.Logger;
  private component: string;

  constructor(options: LoggerOptions) {
    this.component = options.component;

    const transports: Transport[] = [];

    // Console transport (always enabled unless explicitly disabled)
    if (options.enableConsole !== false) {
      transports.push(
        new winston.transports.Console({
          format: combine(
            colorize(),
            timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            errors({ stack: true }),
            consoleFormat
          ),
        })
      );
    }

    // File transport (optional)
    if (options.enableFile && options.logFilePath) {
      transports.push(
        new winston.transports.File({
          filename: options.logFilePath,
          format: combine(
            timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            errors({ stack: true }),
            winston.format.json()
          ),
        })
      );
    }

    const config = loadLoggingConfig();
    this.logger = winston.createLogger({
      level: options.logLevel ?? config.logLevel,
      silent: options.silent ?? config.logSilent,
      format: combine(
        timestamp(),
        errors({ stack: true }),
        winston.format.json()
      ),
      transports,
      exitOnError: false,
    });
  }

  debug(message: string, meta?: LogMeta) {
    this.logger.debug(message, { component: this.component, ...meta });
  }

  info(message: string, meta?: LogMeta) {
    this.logger.info(message, { component: this.component, ...meta });
  }

  warn(message: string, meta?: LogMeta) {
    this.logger.warn(message, { component: this.component, ...meta });
  }

  error(message: string, error?: unknown, meta?: LogMeta) {
    const errorMeta: LogMeta = { component: this.component, ...meta };

    if (error) {
      if (error instanceof Error) {
        errorMeta.stackTrace = error.stack;
        errorMeta.errorCode = error.name;
      } else if (typeof error === 'object') {
        errorMeta.errorDetails = error;
      }
    }

    this.logger.error(message, errorMeta);
  }

  // Convenience method for row-level logs
  logRow(level: 'info' | 'warn' | 'error', message: string, rowIndex: number, meta?: LogMeta) {
    this.logger[level](message, {
      component: this.component,
      rowIndex,
      ...meta,
    });
  }

  getLevel(): string {
    return this.logger.level;
  }

  isSilent(): boolean {
    return this.logger.silent;
  }

  close() {
    this.logger.close();
  }
}

// Singleton factory for creating loggers
class LoggerFactory {
  private static loggers: Map<string, Logger> = new Map();

  static getLogger(component: string, options?: Partial<LoggerOptions>): Logger {
    let logger = this.loggers.get(component);
    if (!logger) {
      logger = new Logger({ component, ...options });
      this.loggers.set(component, logger);
    }
    return logger;
  }

  static closeAll() {
    this.loggers.forEach((logger) => logger.close());
    this.loggers.clear();
  }
}

export { LoggerFactory };
