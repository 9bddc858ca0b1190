/**
 * Logging
 *
 * Service-scoped loggers over a single winston root logger.
 */

import winston from 'winston';

const { combine, timestamp, printf, colorize } = winston.format;

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, errorOrMeta?: Error | LogMeta): void;
}

export interface LoggerOptions {
  /** Service name attached to every line */
  service: string;
}

const lineFormat = printf(({ level, message, timestamp: ts, service, ...meta }) => {
  const serviceTag = typeof service === 'string' ? `[${service}]` : '';
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(ts)} ${level} ${serviceTag} ${String(message)}${metaStr}`;
});

const rootLogger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  silent: process.env.NODE_ENV === 'test',
  format: combine(timestamp(), lineFormat),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), timestamp(), lineFormat),
    }),
  ],
});

class ServiceLogger implements Logger {
  constructor(private readonly target: winston.Logger) {}

  debug(message: string, meta?: LogMeta): void {
    this.target.debug(message, meta ?? {});
  }

  info(message: string, meta?: LogMeta): void {
    this.target.info(message, meta ?? {});
  }

  warn(message: string, meta?: LogMeta): void {
    this.target.warn(message, meta ?? {});
  }

  error(message: string, errorOrMeta?: Error | LogMeta): void {
    if (errorOrMeta instanceof Error) {
      this.target.error(message, { error: errorOrMeta.message, stack: errorOrMeta.stack });
      return;
    }
    this.target.error(message, errorOrMeta ?? {});
  }
}

export function createLogger(options: LoggerOptions): Logger {
  return new ServiceLogger(rootLogger.child({ service: options.service }));
}

/**
 * Change the level of the root logger at runtime (e.g. after settings load).
 */
export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
}
