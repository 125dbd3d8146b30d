import { spawn } from 'child_process';
import {
  CommandInvocation,
  CommandResult,
  CommandRunner as ICommandRunner,
} from '../interfaces/CommandRunner';

/**
 * Custom error classes for external tool invocations
 */
export class ToolError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ToolError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class ExecutableNotFoundError extends ToolError {
  constructor(
    public readonly executable: string,
    cause?: Error
  ) {
    super(`Could not find ${executable}`, 'spawn', cause);
    this.name = 'ExecutableNotFoundError';
  }
}

export class CommandTimeoutError extends ToolError {
  constructor(
    public readonly executable: string,
    public readonly timeoutMs: number
  ) {
    super(`${executable} timed out after ${Math.round(timeoutMs / 1000)} seconds`, 'timeout');
    this.name = 'CommandTimeoutError';
  }
}

export class CommandExecutionError extends ToolError {
  constructor(message: string, cause?: Error) {
    super(message, 'spawn', cause);
    this.name = 'CommandExecutionError';
  }
}

const KILL_GRACE_PERIOD_MS = 10000;

/**
 * Runs external tools as child processes and collects their output
 */
export class CommandRunner implements ICommandRunner {
  async run(invocation: CommandInvocation): Promise<CommandResult> {
    const startTime = Date.now();

    return new Promise((resolve, reject) => {
      const child = spawn(invocation.executable, invocation.args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        env: { ...process.env, ...invocation.env },
      });

      let stdout = '';
      let stderr = '';
      let settled = false;
      let timeout: NodeJS.Timeout | undefined;

      const finish = (action: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        if (timeout) {
          clearTimeout(timeout);
        }
        action();
      };

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code: number | null) => {
        finish(() =>
          resolve({
            exitCode: code ?? -1,
            stdout,
            stderr,
            duration: Date.now() - startTime,
          })
        );
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        finish(() => reject(this.analyzeSpawnError(invocation.executable, error)));
      });

      if (invocation.timeoutMs !== undefined) {
        const timeoutMs = invocation.timeoutMs;
        timeout = setTimeout(() => {
          finish(() => {
            // Try graceful termination first
            child.kill('SIGTERM');

            const forceKill = setTimeout(() => {
              if (child.exitCode === null && child.signalCode === null) {
                child.kill('SIGKILL');
              }
            }, KILL_GRACE_PERIOD_MS);
            forceKill.unref();

            reject(new CommandTimeoutError(invocation.executable, timeoutMs));
          });
        }, timeoutMs);
      }
    });
  }

  /**
   * Map spawn failures onto the error taxonomy
   */
  private analyzeSpawnError(executable: string, error: NodeJS.ErrnoException): ToolError {
    if (error.code === 'ENOENT') {
      return new ExecutableNotFoundError(executable, error);
    }

    if (error.code === 'EACCES') {
      return new CommandExecutionError(
        `Permission denied executing ${executable}. Please check file permissions.`,
        error
      );
    }

    return new CommandExecutionError(`Failed to execute ${executable}: ${error.message}`, error);
  }
}
