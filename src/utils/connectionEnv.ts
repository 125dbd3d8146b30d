import { ConnectionConfig } from '../interfaces/ToolConfig';

/**
 * Environment overlay that hands credentials to libpq tools without putting
 * them on the command line.
 */
export function buildConnectionEnv(connection: ConnectionConfig): Readonly<Record<string, string>> {
  const env: Record<string, string> = { PGPASSWORD: connection.password };
  if (connection.sslMode) {
    env.PGSSLMODE = connection.sslMode;
  }
  return Object.freeze(env);
}

/**
 * Flags shared by pg_dump and psql for addressing the target database
 */
export function buildConnectionArgs(connection: ConnectionConfig): string[] {
  return [
    `--host=${connection.host}`,
    `--port=${connection.port}`,
    `--username=${connection.user}`,
    `--dbname=${connection.database}`,
  ];
}

const CREDENTIAL_FAILURE_PATTERNS = [
  /wrong password/i,
  /password authentication failed/i,
  /authentication failed/i,
];

export function isCredentialFailure(output: string): boolean {
  return CREDENTIAL_FAILURE_PATTERNS.some(pattern => pattern.test(output));
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
