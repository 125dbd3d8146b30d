import { Client } from 'pg';
import { PostgreSQLClient as IPostgreSQLClient } from '../interfaces/PostgreSQLClient';
import { Logger } from '../interfaces/Logger';
import { ConnectionConfig } from '../interfaces/ToolConfig';
import { ToolError } from './CommandRunner';
import { formatError } from '../utils/connectionEnv';

export class ConnectionError extends ToolError {
  constructor(message: string, cause?: Error) {
    super(message, 'connection', cause);
    this.name = 'ConnectionError';
  }
}

const TLS_SSL_MODES = ['require', 'verify-ca', 'verify-full'];

/**
 * Preflight check that the configured credentials reach the database
 */
export class PostgreSQLClient implements IPostgreSQLClient {
  private connection: ConnectionConfig;
  private logger: Logger;

  constructor(connection: ConnectionConfig, logger: Logger) {
    this.connection = connection;
    this.logger = logger;
  }

  async testConnection(): Promise<boolean> {
    const client = new Client({
      host: this.connection.host,
      port: this.connection.port,
      user: this.connection.user,
      password: this.connection.password,
      database: this.connection.database,
      ssl: this.usesTls() ? { rejectUnauthorized: false } : undefined,
    });

    try {
      await client.connect();
      await client.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.error(
        'PostgreSQL connection test failed',
        error instanceof Error ? error : new ConnectionError(formatError(error))
      );
      return false;
    } finally {
      await client.end().catch((cleanupError: unknown) => {
        this.logger.warn('Failed to close database connection during cleanup', {
          error: formatError(cleanupError),
        });
      });
    }
  }

  private usesTls(): boolean {
    return this.connection.sslMode !== undefined && TLS_SSL_MODES.includes(this.connection.sslMode);
  }
}
