import { promises as fs } from 'fs';
import { join } from 'path';
import { BackupTool, backupFileName, formatTimestamp } from '../src/backup/BackupTool';
import { BackupCreationError, PgDumpClient } from '../src/clients/PgDumpClient';
import { ExecutableNotFoundError } from '../src/clients/CommandRunner';
import { ExecutableResolver } from '../src/utils/ExecutableResolver';
import { ToolConfig } from '../src/interfaces/ToolConfig';
import {
  FakeCommandRunner,
  createMockLogger,
  createTempDir,
  dumpWritingRunner,
  flagValue,
  removeTempDir,
  result,
  testConnection,
} from './helpers';

describe('BackupTool', () => {
  const fixedNow = () => new Date(2025, 0, 2, 3, 4, 5);
  const resolver = new ExecutableResolver(undefined, () => false);
  let tempDir: string;
  let config: ToolConfig;
  let logger: ReturnType<typeof createMockLogger>;

  const createTool = (runner: FakeCommandRunner, toolConfig: ToolConfig = config): BackupTool =>
    new BackupTool(
      new PgDumpClient(testConnection, resolver, runner),
      toolConfig,
      logger,
      fixedNow
    );

  beforeEach(async () => {
    tempDir = await createTempDir();
    config = { connection: testConnection, backupDir: tempDir, logLevel: 'info' };
    logger = createMockLogger();
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  describe('file naming', () => {
    it('should format timestamps as YYYYMMDD_HHMMSS', () => {
      expect(formatTimestamp(new Date(2025, 10, 25, 0, 4, 20))).toBe('20251125_000420');
    });

    it('should name files by mode', () => {
      expect(backupFileName('schema-only', '20250102_030405')).toBe(
        'schema_only_20250102_030405.sql'
      );
      expect(backupFileName('full', '20250102_030405')).toBe('full_backup_20250102_030405.sql');
      expect(backupFileName('full', '20250102_030405', 2)).toBe(
        'full_backup_20250102_030405_2.sql'
      );
    });
  });

  it('should run schema-only then full backups', async () => {
    const runner = dumpWritingRunner('SELECT 1;\n');

    const results = await createTool(runner).run();

    expect(results).toEqual([
      {
        mode: 'schema-only',
        success: true,
        filePath: join(tempDir, 'schema_only_20250102_030405.sql'),
        fileSize: 10,
        duration: expect.any(Number),
      },
      {
        mode: 'full',
        success: true,
        filePath: join(tempDir, 'full_backup_20250102_030405.sql'),
        fileSize: 10,
        duration: expect.any(Number),
      },
    ]);
    expect(runner.invocations).toHaveLength(2);
    expect(runner.invocations[0].args).toContain('--schema-only');
    expect(runner.invocations[1].args).toContain('--exclude-schema=auth');
    expect(logger.logBackupComplete).toHaveBeenCalledWith(
      'full',
      join(tempDir, 'full_backup_20250102_030405.sql'),
      10,
      expect.any(Number)
    );
  });

  it('should create a missing backup directory', async () => {
    const backupDir = join(tempDir, 'nested', 'backups');

    const results = await createTool(dumpWritingRunner(), { ...config, backupDir }).run();

    expect(results.every(run => run.success)).toBe(true);
    const files = (await fs.readdir(backupDir)).sort();
    expect(files).toEqual([
      'full_backup_20250102_030405.sql',
      'schema_only_20250102_030405.sql',
    ]);
  });

  it('should run only the requested modes', async () => {
    const runner = dumpWritingRunner();

    const results = await createTool(runner).run(['full']);

    expect(results.map(run => run.mode)).toEqual(['full']);
    expect(runner.invocations).toHaveLength(1);
  });

  it('should still run the full backup when the schema-only backup fails', async () => {
    const runner = new FakeCommandRunner(async invocation => {
      if (invocation.args.includes('--schema-only')) {
        return result({ exitCode: 1, stderr: 'pg_dump: error: aborting' });
      }
      await fs.writeFile(flagValue(invocation.args, 'file') ?? '', 'data');
      return result();
    });

    const [schemaOnly, full] = await createTool(runner).run();

    expect(schemaOnly).toMatchObject({
      mode: 'schema-only',
      success: false,
      fileSize: 0,
      error: 'BackupCreationError: pg_dump failed for schema-only (exit code 1): pg_dump: error: aborting',
    });
    expect(full).toMatchObject({ mode: 'full', success: true, fileSize: 4 });
    expect(logger.logBackupError).toHaveBeenCalledWith(
      'schema-only',
      expect.any(BackupCreationError),
      { exitCode: 1 }
    );
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should add a hint when the password is rejected', async () => {
    const runner = new FakeCommandRunner(async () =>
      result({ exitCode: 1, stderr: 'FATAL: Wrong password' })
    );

    await createTool(runner).run(['full']);

    expect(logger.warn).toHaveBeenCalledWith(
      "Hint: the password was rejected. Reset it and update 'PASS' in .env."
    );
  });

  it('should warn when a partial dump file is left behind', async () => {
    const runner = new FakeCommandRunner(async invocation => {
      const outputPath = flagValue(invocation.args, 'file') ?? '';
      await fs.mkdir(outputPath);
      await fs.writeFile(join(outputPath, 'inner.sql'), 'partial');
      return result({ exitCode: 1, stderr: 'pg_dump: error: aborting' });
    });

    const [full] = await createTool(runner).run(['full']);

    expect(full).toMatchObject({
      success: false,
      error: 'BackupCreationError: pg_dump failed for full (exit code 1): pg_dump: error: aborting',
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.stringContaining(
        `Could not remove partial backup file ${join(tempDir, 'full_backup_20250102_030405.sql')}: `
      )
    );
  });

  it('should report a missing pg_dump with install guidance for each mode', async () => {
    const notFound = new ExecutableNotFoundError('pg_dump');
    const runner = new FakeCommandRunner(async () => {
      throw notFound;
    });

    const results = await createTool(runner).run();

    expect(results.map(run => run.success)).toEqual([false, false]);
    expect(runner.invocations).toHaveLength(2);
    expect(logger.error).toHaveBeenCalledWith('Could not find pg_dump at: pg_dump', notFound, {
      mode: 'schema-only',
    });
    expect(logger.error).toHaveBeenCalledWith('Could not find pg_dump at: pg_dump', notFound, {
      mode: 'full',
    });
    expect(logger.warn).toHaveBeenCalledWith(
      'Ensure PostgreSQL client tools are installed (e.g., brew install postgresql).'
    );
  });

  it('should report unexpected errors with their message', async () => {
    const failure = new Error('disk exploded');
    const runner = new FakeCommandRunner(async () => {
      throw failure;
    });

    const [, full] = await createTool(runner).run();

    expect(full.error).toBe('Error: disk exploded');
    expect(full.filePath).toBe(join(tempDir, 'full_backup_20250102_030405.sql'));
    expect(logger.error).toHaveBeenCalledWith(
      'An error occurred during full backup: Error: disk exploded',
      failure
    );
  });

  it('should never overwrite an earlier backup taken in the same second', async () => {
    let run = 0;
    const runner = new FakeCommandRunner(async invocation => {
      await fs.writeFile(flagValue(invocation.args, 'file') ?? '', `run ${run}`);
      return result();
    });
    const tool = createTool(runner);

    run = 1;
    const first = await tool.run();
    run = 2;
    const second = await tool.run();

    expect(second.map(backup => backup.filePath)).toEqual([
      join(tempDir, 'schema_only_20250102_030405_1.sql'),
      join(tempDir, 'full_backup_20250102_030405_1.sql'),
    ]);
    for (const backup of first) {
      await expect(fs.readFile(backup.filePath, 'utf8')).resolves.toBe('run 1');
    }
    for (const backup of second) {
      await expect(fs.readFile(backup.filePath, 'utf8')).resolves.toBe('run 2');
    }
  });

  it('should fail every mode without running pg_dump when the directory cannot be created', async () => {
    const blocker = join(tempDir, 'not-a-directory');
    await fs.writeFile(blocker, '');
    const runner = dumpWritingRunner();

    const results = await createTool(runner, { ...config, backupDir: join(blocker, 'backups') }).run();

    expect(results).toHaveLength(2);
    expect(results.every(run => !run.success)).toBe(true);
    expect(results[0].error).toMatch(/^Failed to create backup directory /);
    expect(runner.invocations).toHaveLength(0);
  });
});
