import winston from 'winston';
import { Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';
import { getErrorString } from '../utils/errorUtils';

const SENSITIVE_KEYS = [
  'password',
  'secret',
  'token',
  'credential',
  'accesskey',
  'access_key',
  'secretkey',
  'secret_key',
  'dbpass',
  'aws_secret',
];

function isRecord(value: unknown): value is LogMeta {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof Error)
  );
}

/**
 * Sanitize metadata to remove sensitive information
 */
export function sanitizeMeta(meta: LogMeta): LogMeta {
  const sanitized: LogMeta = { ...meta };

  for (const [key, value] of Object.entries(sanitized)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

    if (isSensitive) {
      sanitized[key] = '[REDACTED]';
    } else if (isRecord(value)) {
      sanitized[key] = sanitizeMeta(value);
    }
  }

  return sanitized;
}

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.INFO) {
    this.winston = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.printf(info => {
          const { timestamp, level, message, stack, ...meta } = info;
          const logEntry: LogMeta = {
            timestamp,
            level,
            message,
          };

          if (stack) {
            logEntry.stack = stack;
          }

          if (Object.keys(meta).length > 0) {
            logEntry.meta = sanitizeMeta(meta);
          }

          return JSON.stringify(logEntry);
        })
      ),
      // stdout is reserved for listings and progress output
      transports: [
        new winston.transports.Console({
          stderrLevels: Object.values(LogLevel),
        }),
      ],
    });
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    const errorMeta: LogMeta = { ...meta };

    if (error) {
      const details: LogMeta = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
      for (const property of ['code', 'errno', 'syscall', 'path', 'operation']) {
        const value = getErrorString(error, property);
        if (value) {
          details[property] = value;
        }
      }
      errorMeta.error = details;
    }

    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta);
  }

  logBackupStart(databaseName: string, meta?: LogMeta): void {
    this.info('Backup operation started', {
      operation: 'backup_start',
      databaseName,
      ...meta,
    });
  }

  logBackupComplete(key: string, fileSize: number, s3Location: string, duration: number): void {
    this.info('Backup operation completed successfully', {
      operation: 'backup_complete',
      s3Key: key,
      fileSize,
      s3Location,
      duration,
      fileSizeMB: Math.round((fileSize / 1024 / 1024) * 100) / 100,
    });
  }

  logBackupError(operation: string, error: Error, meta?: LogMeta): void {
    this.error(`Backup operation failed: ${operation}`, error, {
      operation: 'backup_error',
      failedOperation: operation,
      ...meta,
    });
  }

  logDownloadComplete(key: string, filePath: string, bytes: number, duration: number): void {
    this.info('Download completed', {
      operation: 'download_complete',
      s3Key: key,
      filePath,
      bytes,
      duration,
    });
  }

  logRetentionCleanup(deletedCount: number, keepCount: number): void {
    this.info('Retention cleanup completed', {
      operation: 'retention_cleanup',
      deletedCount,
      keepCount,
    });
  }

  logConfigurationStart(config: LogMeta): void {
    this.info('Application starting with configuration', {
      operation: 'startup',
      config: sanitizeMeta(config),
    });
  }

  logScheduledExecution(cronExpression: string): void {
    this.info('Scheduled backup execution triggered', {
      operation: 'scheduled_execution',
      cronExpression,
    });
  }

  /**
   * Create a logger instance with the specified log level from environment
   */
  static createFromEnvironment(level: string | undefined = process.env.LOG_LEVEL): Logger {
    const logLevel = Object.values(LogLevel).find(value => value === level?.toLowerCase());

    if (level && !logLevel) {
      console.warn(`Invalid LOG_LEVEL: ${level}. Using INFO level.`);
    }

    return new Logger(logLevel ?? LogLevel.INFO);
  }
}
