/**
 * @swapledger/utils - Shared utilities
 */

import winston from 'winston';

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  level?: string;
  /** Also write JSON lines to this file */
  logFile?: string;
  silent?: boolean;
}

// Logger
export class Logger {
  private logger: winston.Logger;

  constructor(private readonly name: string, options: LoggerOptions = {}, parent?: winston.Logger) {
    if (parent) {
      this.logger = parent.child({ service: name });
      return;
    }

    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.simple()
        )
      })
    ];

    if (options.logFile) {
      transports.push(new winston.transports.File({ filename: options.logFile }));
    }

    this.logger = winston.createLogger({
      level: options.level || process.env.LOG_LEVEL || 'info',
      silent: options.silent,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      defaultMeta: { service: name },
      transports
    });
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.logger.error(message, { error: error.message, stack: error.stack, ...meta });
    } else {
      this.logger.error(message, { error, ...meta });
    }
  }

  /**
   * Logger for a sub-component sharing this logger's level and transports
   */
  child(name: string): Logger {
    return new Logger(`${this.name}.${name}`, {}, this.logger);
  }

  // Get the underlying winston logger instance for compatibility
  getWinstonLogger(): winston.Logger {
    return this.logger;
  }
}

export * from './SerialQueue';
export * from './serialize';
