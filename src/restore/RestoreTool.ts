import { promises as fs } from 'fs';
import { join } from 'path';
import { Logger } from '../interfaces/Logger';
import { Prompter } from '../interfaces/Prompter';
import { ToolConfig } from '../interfaces/ToolConfig';
import { PsqlClient, RESTORE_TIMEOUT_MS, RestoreExecutionError } from '../clients/PsqlClient';
import { CommandTimeoutError, ExecutableNotFoundError } from '../clients/CommandRunner';
import { formatError } from '../utils/connectionEnv';

export const CONFIRMATION_PHRASE = 'YES';

export type RestoreState =
  | 'AwaitingFile'
  | 'AwaitingConfirmation'
  | 'Executing'
  | 'Succeeded'
  | 'Failed'
  | 'TimedOut'
  | 'Cancelled';

export type TerminalRestoreState = Extract<
  RestoreState,
  'Succeeded' | 'Failed' | 'TimedOut' | 'Cancelled'
>;

export type RestoreFailureReason =
  | 'no_file'
  | 'file_not_found'
  | 'executable_not_found'
  | 'exit_code'
  | 'unexpected';

export interface RestoreOutcome {
  state: TerminalRestoreState;
  filePath?: string;
  reason?: RestoreFailureReason;
  exitCode?: number;

  /** Duration of the psql run in milliseconds */
  duration?: number;
}

const TRANSITIONS: Record<RestoreState, readonly RestoreState[]> = {
  AwaitingFile: ['AwaitingConfirmation', 'Failed'],
  AwaitingConfirmation: ['Executing', 'Cancelled'],
  Executing: ['Succeeded', 'Failed', 'TimedOut'],
  Succeeded: [],
  Failed: [],
  TimedOut: [],
  Cancelled: [],
};

const FULL_BACKUP_PATTERN = /^full_backup_(\d{8}_\d{6})(?:_(\d+))?\.sql$/;

/**
 * Interactive restore of a dump file through psql
 */
export class RestoreTool {
  private state: RestoreState = 'AwaitingFile';
  private psqlClient: PsqlClient;
  private config: ToolConfig;
  private prompter: Prompter;
  private logger: Logger;

  constructor(psqlClient: PsqlClient, config: ToolConfig, prompter: Prompter, logger: Logger) {
    this.psqlClient = psqlClient;
    this.config = config;
    this.prompter = prompter;
    this.logger = logger;
  }

  getState(): RestoreState {
    return this.state;
  }

  /**
   * Walk the restore through file selection, confirmation and execution.
   * A file passed in skips the file prompt.
   */
  async run(requestedFile?: string): Promise<RestoreOutcome> {
    if (this.state !== 'AwaitingFile') {
      throw new Error(`Restore already ran (state: ${this.state})`);
    }

    const filePath = requestedFile?.trim() || (await this.promptForFile());
    if (!filePath) {
      this.logger.error('No backup file given and no default available');
      return this.finish({ state: 'Failed', reason: 'no_file' });
    }

    if (!(await isFile(filePath))) {
      this.logger.error(`File not found: ${filePath}`);
      return this.finish({ state: 'Failed', filePath, reason: 'file_not_found' });
    }
    this.transition('AwaitingConfirmation');

    this.logger.warn('=======================================================');
    this.logger.warn('WARNING: This operation will OVERWRITE existing data!');
    this.logger.warn('=======================================================');

    const confirmation = await this.prompter.ask(
      `Type '${CONFIRMATION_PHRASE}' to proceed with the database RESTORE: `
    );
    if (confirmation.trim().toUpperCase() !== CONFIRMATION_PHRASE) {
      this.logger.info('Restore cancelled by user.');
      return this.finish({ state: 'Cancelled', filePath });
    }
    this.transition('Executing');

    return this.execute(filePath);
  }

  /**
   * Default suggestion for the file prompt: the configured file, else the
   * newest full backup in the backup directory
   */
  async suggestDefaultFile(): Promise<string | undefined> {
    if (this.config.restoreDefaultFile) {
      return this.config.restoreDefaultFile;
    }

    let entries: string[];
    try {
      entries = await fs.readdir(this.config.backupDir);
    } catch (error) {
      this.logger.debug('Backup directory not readable, no default restore file', {
        backupDir: this.config.backupDir,
        error: formatError(error),
      });
      return undefined;
    }

    const newest = entries
      .map(name => ({ name, match: FULL_BACKUP_PATTERN.exec(name) }))
      .filter(entry => entry.match !== null)
      .sort((a, b) => compareBackupNames(a.match, b.match))
      .pop();

    return newest ? join(this.config.backupDir, newest.name) : undefined;
  }

  private async promptForFile(): Promise<string | undefined> {
    const suggestion = await this.suggestDefaultFile();
    const question = suggestion
      ? `Enter the backup file to restore (default: ${suggestion}): `
      : 'Enter the backup file to restore: ';
    const answer = await this.prompter.ask(question);
    return answer || suggestion;
  }

  private async execute(filePath: string): Promise<RestoreOutcome> {
    this.logger.logRestoreStart(filePath, this.config.connection.host);

    try {
      const result = await this.psqlClient.restore(filePath);
      this.logger.logRestoreComplete(filePath, result.duration);
      return this.finish({ state: 'Succeeded', filePath, exitCode: 0, duration: result.duration });
    } catch (error) {
      if (error instanceof CommandTimeoutError) {
        const seconds = RESTORE_TIMEOUT_MS / 1000;
        this.logger.error(
          `Restore timed out after ${seconds} seconds (${seconds / 60} minutes). ` +
            'The file may be too large or the connection too slow.'
        );
        return this.finish({ state: 'TimedOut', filePath });
      }

      if (error instanceof RestoreExecutionError) {
        this.reportExecutionFailure(error);
        return this.finish({
          state: 'Failed',
          filePath,
          reason: 'exit_code',
          exitCode: error.exitCode,
        });
      }

      if (error instanceof ExecutableNotFoundError) {
        this.logger.error(`Could not find psql at: ${error.executable}`, error);
        this.logger.warn(
          'Ensure PostgreSQL client tools are installed (e.g., brew install postgresql).'
        );
        return this.finish({ state: 'Failed', filePath, reason: 'executable_not_found' });
      }

      this.logger.error(
        `An unexpected error occurred: ${formatError(error)}`,
        error instanceof Error ? error : undefined
      );
      return this.finish({ state: 'Failed', filePath, reason: 'unexpected' });
    }
  }

  private reportExecutionFailure(error: RestoreExecutionError): void {
    this.logger.error(error.message, undefined, { exitCode: error.exitCode });
    // psql sends errors to both streams
    if (error.stdout) {
      this.logger.error(`--- Output from psql ---\n${error.stdout}`);
    }
    if (error.stderr) {
      this.logger.error(`--- Errors from psql ---\n${error.stderr}`);
    }
    this.logger.warn(
      error.credentialFailure
        ? "Hint: the password was rejected. Reset it and update 'PASS' in .env."
        : "Hint: if you see a 'Wrong password' error, reset the password and update 'PASS' in .env."
    );
  }

  private finish(outcome: RestoreOutcome): RestoreOutcome {
    this.transition(outcome.state);
    return outcome;
  }

  private transition(next: RestoreState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Invalid restore transition: ${this.state} -> ${next}`);
    }
    this.logger.debug('Restore state changed', { from: this.state, to: next });
    this.state = next;
  }
}

function compareBackupNames(a: RegExpExecArray | null, b: RegExpExecArray | null): number {
  const stampA = a?.[1] ?? '';
  const stampB = b?.[1] ?? '';
  if (stampA !== stampB) {
    return stampA < stampB ? -1 : 1;
  }
  return Number(a?.[2] ?? 0) - Number(b?.[2] ?? 0);
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isFile();
  } catch {
    return false;
  }
}
