#!/usr/bin/env node
import { resolve } from 'path';
import { Command, Option } from 'commander';
import { BACKUP_MODES, BackupRunResult, BackupTool } from '../backup/BackupTool';
import { PgDumpClient } from '../clients/PgDumpClient';
import { ConsolePrompter } from '../clients/ConsolePrompter';
import { ExecutableResolver } from '../utils/ExecutableResolver';
import { BackupMode } from '../types/BackupArtifact';
import { CommonOptions, ToolDependencies, bootstrap, loadEnvFile } from './bootstrap';

export type ModeOption = 'all' | BackupMode;

export interface BackupCliOptions extends CommonOptions {
  outputDir?: string;
  mode: ModeOption;
}

export function createBackupProgram(): Command {
  return new Command('supabase-backup')
    .description('Create schema-only and full pg_dump backups of a Supabase database')
    .option('-o, --output-dir <dir>', 'directory for backup files (default: BACKUP_DIR or cwd)')
    .addOption(
      new Option('-m, --mode <mode>', 'which backups to create')
        .choices(['all', 'schema-only', 'full'])
        .default('all')
    )
    .option('--env-file <path>', 'read environment variables from this file')
    .option('--check-connection', 'verify the credentials before running pg_dump')
    .option('--log-level <level>', 'error, warn, info or debug');
}

export function modesFor(option: ModeOption): readonly BackupMode[] {
  return option === 'all' ? BACKUP_MODES : [option];
}

export async function runBackup(
  options: BackupCliOptions,
  deps: ToolDependencies = {}
): Promise<BackupRunResult[]> {
  const prompter = deps.prompter ?? new ConsolePrompter();

  try {
    const context = await bootstrap(options, prompter, deps);
    if (!context) {
      return [];
    }

    const { logger, runner } = context;
    const config = options.outputDir
      ? { ...context.config, backupDir: resolve(deps.cwd ?? process.cwd(), options.outputDir) }
      : context.config;

    const dumpClient = new PgDumpClient(
      config.connection,
      new ExecutableResolver(config.binDir),
      runner
    );
    const results = await new BackupTool(dumpClient, config, logger).run(modesFor(options.mode));

    const succeeded = results.filter(result => result.success).length;
    logger.info(`Backups finished: ${succeeded} of ${results.length} succeeded`);
    return results;
  } finally {
    prompter.close();
  }
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createBackupProgram();
  program.action(async () => {
    const options = program.opts<BackupCliOptions>();
    loadEnvFile(options.envFile);
    await runBackup(options);
  });
  await program.parseAsync(argv);
}

if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error running backup:', error);
    process.exit(1);
  });
}
