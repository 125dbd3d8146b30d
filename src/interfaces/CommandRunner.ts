/**
 * A single external tool invocation
 */
export interface CommandInvocation {
  /** Executable path or bare command name */
  executable: string;

  args: string[];

  /** Variables laid over a copy of the process environment */
  env: Readonly<Record<string, string>>;

  /** Upper bound on run time in milliseconds; unbounded when absent */
  timeoutMs?: number;
}

/**
 * Outcome of a process that ran to exit
 */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;

  /** Duration of the run in milliseconds */
  duration: number;
}

export interface CommandRunner {
  run(invocation: CommandInvocation): Promise<CommandResult>;
}
