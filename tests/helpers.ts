import { promises as fs } from 'fs';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Logger } from '../src/interfaces/Logger';
import { Prompter } from '../src/interfaces/Prompter';
import { CommandInvocation, CommandResult, CommandRunner } from '../src/interfaces/CommandRunner';
import { ConnectionConfig } from '../src/interfaces/ToolConfig';

export const testConnection: ConnectionConfig = {
  host: 'db.example.test',
  port: 6543,
  user: 'postgres',
  password: 'test-secret',
  database: 'postgres',
};

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    logBackupStart: jest.fn(),
    logBackupComplete: jest.fn(),
    logBackupError: jest.fn(),
    logRestoreStart: jest.fn(),
    logRestoreComplete: jest.fn(),
    logConfigurationStart: jest.fn(),
  };
}

/**
 * Prompter that answers from a fixed script, then behaves like closed input
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  closed = false;
  private answers: string[];

  constructor(answers: string[] = []) {
    this.answers = [...answers];
  }

  ask = jest.fn(async (question: string): Promise<string> => this.next(question));

  askSecret = jest.fn(async (question: string): Promise<string> => this.next(question));

  close(): void {
    this.closed = true;
  }

  private next(question: string): string {
    this.questions.push(question);
    return (this.answers.shift() ?? '').trim();
  }
}

type Handler = (invocation: CommandInvocation) => Promise<CommandResult>;

/**
 * Records invocations instead of spawning processes
 */
export class FakeCommandRunner implements CommandRunner {
  readonly invocations: CommandInvocation[] = [];
  private handler: Handler;

  constructor(handler: Handler = async () => result()) {
    this.handler = handler;
  }

  async run(invocation: CommandInvocation): Promise<CommandResult> {
    this.invocations.push(invocation);
    return this.handler(invocation);
  }
}

export function result(overrides: Partial<CommandResult> = {}): CommandResult {
  return { exitCode: 0, stdout: '', stderr: '', duration: 5, ...overrides };
}

/** Value of a --name=value flag */
export function flagValue(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find(arg => arg.startsWith(prefix))?.slice(prefix.length);
}

/**
 * Runner that behaves like a successful pg_dump by writing the --file target
 */
export function dumpWritingRunner(content = 'SELECT 1;\n'): FakeCommandRunner {
  return new FakeCommandRunner(async invocation => {
    const file = flagValue(invocation.args, 'file');
    if (file) {
      await fs.writeFile(file, content);
    }
    return result();
  });
}

export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'supabase-dump-tools-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
