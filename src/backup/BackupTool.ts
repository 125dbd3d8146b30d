import { promises as fs } from 'fs';
import { join } from 'path';
import { Logger } from '../interfaces/Logger';
import { ToolConfig } from '../interfaces/ToolConfig';
import { BackupMode } from '../types/BackupArtifact';
import { BackupCreationError, PgDumpClient } from '../clients/PgDumpClient';
import { ExecutableNotFoundError } from '../clients/CommandRunner';
import { formatError } from '../utils/connectionEnv';

export const BACKUP_MODES: readonly BackupMode[] = ['schema-only', 'full'];

const FILE_PREFIXES: Record<BackupMode, string> = {
  'schema-only': 'schema_only',
  full: 'full_backup',
};

/**
 * Result of one dump mode
 */
export interface BackupRunResult {
  mode: BackupMode;
  success: boolean;

  /** Empty when the run failed before a file name was chosen */
  filePath: string;

  fileSize: number;

  /** Duration in milliseconds */
  duration: number;

  error?: string;
}

/**
 * Runs the schema-only and full dumps one after the other. A failing mode is
 * reported and does not stop the other.
 */
export class BackupTool {
  private dumpClient: PgDumpClient;
  private config: ToolConfig;
  private logger: Logger;
  private now: () => Date;

  constructor(
    dumpClient: PgDumpClient,
    config: ToolConfig,
    logger: Logger,
    now: () => Date = () => new Date()
  ) {
    this.dumpClient = dumpClient;
    this.config = config;
    this.logger = logger;
    this.now = now;
  }

  async run(modes: readonly BackupMode[] = BACKUP_MODES): Promise<BackupRunResult[]> {
    const timestamp = formatTimestamp(this.now());

    try {
      await fs.mkdir(this.config.backupDir, { recursive: true });
    } catch (error) {
      const message = `Failed to create backup directory ${this.config.backupDir}: ${formatError(error)}`;
      this.logger.error(message, error instanceof Error ? error : undefined);
      return modes.map(mode => ({
        mode,
        success: false,
        filePath: '',
        fileSize: 0,
        duration: 0,
        error: message,
      }));
    }

    const results: BackupRunResult[] = [];
    for (const mode of modes) {
      results.push(await this.runMode(mode, timestamp));
    }
    return results;
  }

  private async runMode(mode: BackupMode, timestamp: string): Promise<BackupRunResult> {
    const startTime = Date.now();
    let filePath = '';

    try {
      filePath = await this.reserveOutputPath(mode, timestamp);
      this.logger.logBackupStart(mode, filePath);

      const artifact = await this.dumpClient.createBackup(mode, filePath);
      const duration = Date.now() - startTime;
      this.logger.logBackupComplete(mode, artifact.filePath, artifact.fileSize, duration);

      return {
        mode,
        success: true,
        filePath: artifact.filePath,
        fileSize: artifact.fileSize,
        duration,
      };
    } catch (error) {
      this.reportFailure(mode, error);
      return {
        mode,
        success: false,
        filePath,
        fileSize: 0,
        duration: Date.now() - startTime,
        error: formatError(error),
      };
    }
  }

  private reportFailure(mode: BackupMode, error: unknown): void {
    if (error instanceof ExecutableNotFoundError) {
      this.logger.error(`Could not find pg_dump at: ${error.executable}`, error, { mode });
      this.logger.warn(
        'Ensure PostgreSQL client tools are installed (e.g., brew install postgresql).'
      );
      return;
    }

    if (error instanceof BackupCreationError) {
      this.logger.logBackupError(mode, error, { exitCode: error.exitCode });
      if (error.cleanupFailure) {
        this.logger.warn(error.cleanupFailure);
      }
      if (error.credentialFailure) {
        this.logger.warn(
          "Hint: the password was rejected. Reset it and update 'PASS' in .env."
        );
      }
      return;
    }

    this.logger.error(
      `An error occurred during ${mode} backup: ${formatError(error)}`,
      error instanceof Error ? error : undefined
    );
  }

  /**
   * Pick a file name that does not exist yet, so an earlier backup taken in
   * the same second is never overwritten
   */
  private async reserveOutputPath(mode: BackupMode, timestamp: string): Promise<string> {
    for (let attempt = 0; ; attempt++) {
      const candidate = join(this.config.backupDir, backupFileName(mode, timestamp, attempt));
      if (!(await pathExists(candidate))) {
        return candidate;
      }
    }
  }
}

/**
 * Format date to YYYYMMDD_HHMMSS in local time
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function backupFileName(mode: BackupMode, timestamp: string, attempt = 0): string {
  const suffix = attempt > 0 ? `_${attempt}` : '';
  return `${FILE_PREFIXES[mode]}_${timestamp}${suffix}.sql`;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}
