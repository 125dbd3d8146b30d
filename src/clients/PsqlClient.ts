import { CommandInvocation, CommandResult, CommandRunner } from '../interfaces/CommandRunner';
import { ConnectionConfig } from '../interfaces/ToolConfig';
import { ExecutableResolver } from '../utils/ExecutableResolver';
import { buildConnectionArgs, buildConnectionEnv, isCredentialFailure } from '../utils/connectionEnv';
import { ToolError } from './CommandRunner';

/** Upper bound on a restore run */
export const RESTORE_TIMEOUT_MS = 5 * 60 * 1000;

export class RestoreExecutionError extends ToolError {
  public readonly credentialFailure: boolean;

  constructor(
    public readonly exitCode: number,
    public readonly stdout: string,
    public readonly stderr: string
  ) {
    super(`psql failed: restore attempt failed with return code ${exitCode}`, 'restore');
    this.name = 'RestoreExecutionError';
    this.credentialFailure = isCredentialFailure(`${stdout}\n${stderr}`);
  }
}

/**
 * Applies SQL script files through psql
 */
export class PsqlClient {
  private connection: ConnectionConfig;
  private resolver: ExecutableResolver;
  private runner: CommandRunner;

  constructor(connection: ConnectionConfig, resolver: ExecutableResolver, runner: CommandRunner) {
    this.connection = connection;
    this.resolver = resolver;
    this.runner = runner;
  }

  buildInvocation(filePath: string): CommandInvocation {
    return {
      executable: this.resolver.resolve('psql'),
      args: [
        ...buildConnectionArgs(this.connection),
        `--file=${filePath}`,
        // Show SQL errors, suppress routine output
        '--echo-errors',
        '--quiet',
      ],
      env: buildConnectionEnv(this.connection),
      timeoutMs: RESTORE_TIMEOUT_MS,
    };
  }

  async restore(filePath: string): Promise<CommandResult> {
    const result = await this.runner.run(this.buildInvocation(filePath));

    if (result.exitCode !== 0) {
      throw new RestoreExecutionError(result.exitCode, result.stdout.trim(), result.stderr.trim());
    }

    return result;
  }
}
