import { promises as fs } from 'fs';
import { CommandInvocation, CommandRunner } from '../interfaces/CommandRunner';
import { ConnectionConfig } from '../interfaces/ToolConfig';
import { BackupArtifact, BackupMode } from '../types/BackupArtifact';
import { ExecutableResolver } from '../utils/ExecutableResolver';
import {
  buildConnectionArgs,
  buildConnectionEnv,
  formatError,
  isCredentialFailure,
} from '../utils/connectionEnv';
import { ToolError } from './CommandRunner';

/**
 * Schemas owned by the Supabase platform, left out of full backups
 */
export const EXCLUDED_SCHEMAS: readonly string[] = [
  'auth',
  'storage',
  'realtime',
  'supabase_functions',
  'supabase_migrations',
];

export class BackupCreationError extends ToolError {
  public readonly credentialFailure: boolean;

  constructor(
    message: string,
    public readonly exitCode?: number,
    public readonly output: string = '',
    /** Set when the partial dump file could not be removed */
    public readonly cleanupFailure?: string
  ) {
    super(message, 'backup_creation');
    this.name = 'BackupCreationError';
    this.credentialFailure = isCredentialFailure(output);
  }
}

/**
 * Produces plain SQL dumps through pg_dump
 */
export class PgDumpClient {
  private connection: ConnectionConfig;
  private resolver: ExecutableResolver;
  private runner: CommandRunner;

  constructor(connection: ConnectionConfig, resolver: ExecutableResolver, runner: CommandRunner) {
    this.connection = connection;
    this.resolver = resolver;
    this.runner = runner;
  }

  buildInvocation(mode: BackupMode, outputPath: string): CommandInvocation {
    const args = [
      ...buildConnectionArgs(this.connection),
      '--clean',
      '--if-exists',
      '--no-owner',
      '--no-privileges',
      `--file=${outputPath}`,
    ];

    if (mode === 'schema-only') {
      args.push('--schema-only');
    } else {
      for (const schema of EXCLUDED_SCHEMAS) {
        args.push(`--exclude-schema=${schema}`);
      }
    }

    return {
      executable: this.resolver.resolve('pg_dump'),
      args,
      env: buildConnectionEnv(this.connection),
    };
  }

  /**
   * Run pg_dump for one mode and verify the output file
   */
  async createBackup(mode: BackupMode, outputPath: string): Promise<BackupArtifact> {
    const timestamp = new Date();
    const result = await this.runner.run(this.buildInvocation(mode, outputPath));

    if (result.exitCode !== 0) {
      const output = result.stderr.trim() || result.stdout.trim();
      const cleanupFailure = await this.removePartialFile(outputPath);
      throw new BackupCreationError(
        `pg_dump failed for ${mode} (exit code ${result.exitCode}): ${output || 'no output'}`,
        result.exitCode,
        output,
        cleanupFailure
      );
    }

    let fileSize: number;
    try {
      fileSize = (await fs.stat(outputPath)).size;
    } catch {
      throw new BackupCreationError(`Backup file was not created at ${outputPath}`, result.exitCode);
    }

    return { mode, filePath: outputPath, fileSize, timestamp };
  }

  /**
   * Returns a description of the failure instead of throwing, so the pg_dump
   * diagnostic is what the caller sees
   */
  private async removePartialFile(outputPath: string): Promise<string | undefined> {
    try {
      await fs.rm(outputPath, { force: true });
      return undefined;
    } catch (error) {
      return `Could not remove partial backup file ${outputPath}: ${formatError(error)}`;
    }
  }
}
