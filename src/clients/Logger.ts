import winston from 'winston';
import { Logger as ILogger, LogLevel } from '../interfaces/Logger';

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'credential'];

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.INFO) {
    this.winston = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        winston.format.timestamp({ format: 'HH:mm:ss' }),
        winston.format.errors({ stack: true })
      ),
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.printf(info => {
              const { timestamp, level, message, ...meta } = info;
              const details = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
              return `${String(timestamp)} ${level}: ${String(message)}${details}`;
            })
          ),
        }),
      ],
    });
  }

  /**
   * Sanitize metadata to remove sensitive information
   */
  private sanitizeMeta(meta: Record<string, unknown>): Record<string, unknown> {
    const sanitized: Record<string, unknown> = { ...meta };

    for (const [key, value] of Object.entries(sanitized)) {
      const lowerKey = key.toLowerCase();
      const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

      if (isSensitive) {
        sanitized[key] = '[REDACTED]';
      } else if (isPlainObject(value)) {
        sanitized[key] = this.sanitizeMeta(value);
      }
    }

    return sanitized;
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.winston.info(message, meta && this.sanitizeMeta(meta));
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.winston.warn(message, meta && this.sanitizeMeta(meta));
  }

  error(message: string, error?: Error, meta?: Record<string, unknown>): void {
    const errorMeta: Record<string, unknown> = meta ? this.sanitizeMeta(meta) : {};
    if (error) {
      const code = 'code' in error ? error.code : undefined;
      errorMeta.error = {
        name: error.name,
        message: error.message,
        ...(code !== undefined ? { code } : {}),
      };
    }
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.winston.debug(message, meta && this.sanitizeMeta(meta));
  }

  logBackupStart(mode: string, filePath: string): void {
    this.info(`Creating ${mode} backup: ${filePath}`, {
      operation: 'backup_start',
      mode,
    });
  }

  logBackupComplete(mode: string, filePath: string, fileSize: number, duration: number): void {
    this.info(`Backup saved: ${filePath} (${fileSize} bytes)`, {
      operation: 'backup_complete',
      mode,
      duration,
      fileSizeMB: Math.round((fileSize / 1024 / 1024) * 100) / 100,
    });
  }

  logBackupError(mode: string, error: Error, meta?: Record<string, unknown>): void {
    this.error(`Backup failed: ${mode}`, error, {
      operation: 'backup_error',
      mode,
      ...meta,
    });
  }

  logRestoreStart(filePath: string, host: string): void {
    this.info(`Restoring ${filePath} to ${host}`, {
      operation: 'restore_start',
    });
  }

  logRestoreComplete(filePath: string, duration: number): void {
    this.info(`Restore complete: database restored from ${filePath}`, {
      operation: 'restore_complete',
      duration,
    });
  }

  logConfigurationStart(config: Record<string, unknown>): void {
    this.debug('Loaded configuration', {
      operation: 'startup',
      config: this.sanitizeMeta(config),
    });
  }

  /**
   * Create a logger instance with the specified log level, falling back to INFO
   */
  static create(level?: string): Logger {
    const logLevel = parseLogLevel(level);

    if (!logLevel) {
      console.warn(`Invalid log level: ${level}. Using INFO level.`);
      return new Logger(LogLevel.INFO);
    }

    return new Logger(logLevel);
  }
}

export function parseLogLevel(level: string | undefined): LogLevel | null {
  if (level === undefined || level === '') {
    return LogLevel.INFO;
  }
  const normalized = level.toLowerCase();
  return Object.values(LogLevel).find(value => value === normalized) ?? null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
