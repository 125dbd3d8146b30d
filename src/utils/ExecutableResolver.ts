import { existsSync } from 'fs';
import { join } from 'path';

/**
 * Install locations checked before falling back to the search path
 */
export const KNOWN_BIN_DIRS: readonly string[] = [
  '/opt/homebrew/opt/postgresql@15/bin',
  '/opt/homebrew/opt/libpq/bin',
  '/usr/local/opt/libpq/bin',
];

export type PathExists = (path: string) => boolean;

/**
 * Finds PostgreSQL client binaries by trying an ordered list of candidates.
 * The bare command name is always the last candidate and is left for the
 * process search path to resolve.
 */
export class ExecutableResolver {
  private binDirs: string[];
  private exists: PathExists;

  constructor(binDir?: string, exists: PathExists = existsSync) {
    this.binDirs = binDir ? [binDir, ...KNOWN_BIN_DIRS] : [...KNOWN_BIN_DIRS];
    this.exists = exists;
  }

  candidates(command: string): string[] {
    return [...this.binDirs.map(dir => join(dir, command)), command];
  }

  resolve(command: string): string {
    const candidates = this.candidates(command);
    return candidates.find(candidate => candidate === command || this.exists(candidate)) ?? command;
  }
}
