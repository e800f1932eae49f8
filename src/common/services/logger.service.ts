import { Injectable, LoggerService } from '@nestjs/common';
import * as winston from 'winston';
import 'winston-daily-rotate-file';

export interface LogContext {
  couponId?: string;
  campaignId?: number;
  stationId?: string;
  dispenserId?: string;
  reason?: string;
  [key: string]: unknown;
}

const REDACTED = '[REDACTED]';
const SECRET_KEYS = new Set([
  'token',
  'tokenSignature',
  'signature',
  'signingSecret',
  'privateKey',
  'password',
]);

/**
 * Copy of a log payload with credential-bearing keys masked at any depth.
 */
export function redactSecrets(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redactSecrets);
  }
  if (value instanceof Date || value === null || typeof value !== 'object') {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [
      key,
      SECRET_KEYS.has(key) ? REDACTED : redactSecrets(entry),
    ]),
  );
}

const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    info[key] = SECRET_KEYS.has(key) ? REDACTED : redactSecrets(info[key]);
  }
  return info;
});

@Injectable()
export class CustomLoggerService implements LoggerService {
  private readonly winston: winston.Logger;
  private context?: string;

  constructor() {
    this.winston = this.createWinstonLogger();
  }

  private createWinstonLogger(): winston.Logger {
    const isDevelopment = process.env.NODE_ENV === 'development';
    const isTest = process.env.NODE_ENV === 'test';
    const logLevel = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');
    const logDir = process.env.LOG_DIR || 'logs';

    const formats = [
      redactFormat(),
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    ];

    if (isDevelopment) {
      formats.push(
        winston.format.colorize({ all: true }),
        winston.format.printf(({ timestamp, level, message, context, ...meta }) => {
          const contextStr = context ? `[${String(context)}] ` : '';
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} ${String(level)}: ${contextStr}${String(message)}${metaStr}`;
        }),
      );
    }

    const transports: winston.transport[] = [
      new winston.transports.Console({
        level: logLevel,
        format: winston.format.combine(...formats),
        silent: isTest,
      }),
    ];

    if (!isDevelopment && !isTest) {
      const fileFormat = winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
      );

      transports.push(
        new winston.transports.DailyRotateFile({
          filename: `${logDir}/coupon-engine-%DATE%.log`,
          datePattern: 'YYYY-MM-DD',
          zippedArchive: true,
          maxSize: '20m',
          maxFiles: '14d',
          level: 'info',
          format: fileFormat,
        }),
      );

      transports.push(
        new winston.transports.DailyRotateFile({
          filename: `${logDir}/coupon-engine-error-%DATE%.log`,
          datePattern: 'YYYY-MM-DD',
          zippedArchive: true,
          maxSize: '20m',
          maxFiles: '30d',
          level: 'error',
          format: fileFormat,
        }),
      );
    }

    return winston.createLogger({
      level: logLevel,
      format: winston.format.combine(...formats),
      transports,
      exitOnError: false,
    });
  }

  setContext(context: string): void {
    this.context = context;
  }

  log(message: string, context?: string | LogContext): void {
    this.winston.info(message, this.meta(context));
  }

  error(message: string, trace?: string, context?: string | LogContext): void {
    this.winston.error(message, { ...this.meta(context), trace });
  }

  warn(message: string, context?: string | LogContext): void {
    this.winston.warn(message, this.meta(context));
  }

  debug(message: string, context?: string | LogContext): void {
    this.winston.debug(message, this.meta(context));
  }

  private meta(context?: string | LogContext): LogContext {
    if (typeof context === 'string') {
      return { context };
    }
    return { context: this.context, ...context };
  }

  logError(error: Error, context?: LogContext): void {
    this.error(error.message, error.stack, {
      type: 'error',
      errorName: error.name,
      ...context,
    });
  }

  logBusinessEvent(event: string, data: Record<string, unknown>, context?: LogContext): void {
    this.log(`Business Event: ${event}`, {
      type: 'business_event',
      event,
      data,
      ...context,
    });
  }

  logSecurityEvent(event: string, context: LogContext): void {
    this.warn(`Security Event: ${event}`, {
      type: 'security_event',
      event,
      ...context,
    });
  }

  logPerformance(operation: string, duration: number, context?: LogContext): void {
    this.log(`Performance: ${operation}`, {
      type: 'performance',
      operation,
      duration,
      ...context,
    });
  }
}
