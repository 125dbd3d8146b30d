#!/usr/bin/env node
import { Command } from 'commander';
import { PsqlClient } from '../clients/PsqlClient';
import { ConsolePrompter } from '../clients/ConsolePrompter';
import { RestoreOutcome, RestoreTool } from '../restore/RestoreTool';
import { ExecutableResolver } from '../utils/ExecutableResolver';
import { CommonOptions, ToolDependencies, bootstrap, loadEnvFile } from './bootstrap';

export interface RestoreCliOptions extends CommonOptions {
  file?: string;
}

export function createRestoreProgram(): Command {
  return new Command('supabase-restore')
    .description('Apply a SQL dump to a Supabase database with psql')
    .option('-f, --file <path>', 'dump file to restore (skips the file prompt)')
    .option('--env-file <path>', 'read environment variables from this file')
    .option('--check-connection', 'verify the credentials before running psql')
    .option('--log-level <level>', 'error, warn, info or debug');
}

export async function runRestore(
  options: RestoreCliOptions,
  deps: ToolDependencies = {}
): Promise<RestoreOutcome | null> {
  const prompter = deps.prompter ?? new ConsolePrompter();

  try {
    const context = await bootstrap(options, prompter, deps);
    if (!context) {
      return null;
    }

    const { config, logger, runner } = context;
    const psqlClient = new PsqlClient(
      config.connection,
      new ExecutableResolver(config.binDir),
      runner
    );
    return await new RestoreTool(psqlClient, config, prompter, logger).run(options.file);
  } finally {
    prompter.close();
  }
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createRestoreProgram();
  program.action(async () => {
    const options = program.opts<RestoreCliOptions>();
    loadEnvFile(options.envFile);
    await runRestore(options);
  });
  await program.parseAsync(argv);
}

if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error running restore:', error);
    process.exit(1);
  });
}
