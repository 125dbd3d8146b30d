export { ConfigurationManager, ConfigurationError } from './config/ConfigurationManager';
export { Logger } from './clients/Logger';
export {
  CommandRunner,
  ToolError,
  ExecutableNotFoundError,
  CommandTimeoutError,
  CommandExecutionError,
} from './clients/CommandRunner';
export { ConsolePrompter } from './clients/ConsolePrompter';
export { PgDumpClient, BackupCreationError, EXCLUDED_SCHEMAS } from './clients/PgDumpClient';
export { PsqlClient, RestoreExecutionError, RESTORE_TIMEOUT_MS } from './clients/PsqlClient';
export { PostgreSQLClient, ConnectionError } from './clients/PostgreSQLClient';
export { BackupTool, BACKUP_MODES, formatTimestamp, backupFileName } from './backup/BackupTool';
export type { BackupRunResult } from './backup/BackupTool';
export { RestoreTool, CONFIRMATION_PHRASE } from './restore/RestoreTool';
export type { RestoreOutcome, RestoreState, RestoreFailureReason } from './restore/RestoreTool';
export { ExecutableResolver, KNOWN_BIN_DIRS } from './utils/ExecutableResolver';
export { runBackup } from './cli/backup';
export { runRestore } from './cli/restore';
export type { ConnectionConfig, ToolConfig } from './interfaces/ToolConfig';
export type { CommandInvocation, CommandResult } from './interfaces/CommandRunner';
export type { Prompter } from './interfaces/Prompter';
export type { BackupArtifact, BackupMode } from './types/BackupArtifact';
export { LogLevel } from './interfaces/Logger';
