export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: Error, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;

  // Specialized logging methods for dump and restore operations
  logBackupStart(mode: string, filePath: string): void;
  logBackupComplete(mode: string, filePath: string, fileSize: number, duration: number): void;
  logBackupError(mode: string, error: Error, meta?: Record<string, unknown>): void;
  logRestoreStart(filePath: string, host: string): void;
  logRestoreComplete(filePath: string, duration: number): void;
  logConfigurationStart(config: Record<string, unknown>): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
