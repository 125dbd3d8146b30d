import { resolve } from 'path';
import { ToolConfig } from '../interfaces/ToolConfig';
import { Prompter } from '../interfaces/Prompter';
import { parseLogLevel } from '../clients/Logger';
import { EnvironmentConfig } from '../types/EnvironmentConfig';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export const DEFAULT_PORT = 6543;
export const DEFAULT_DATABASE = 'postgres';

const SUPABASE_HOST_SUFFIX = '.supabase.co';

export class ConfigurationManager {
  /**
   * Build the tool configuration from environment variables, asking the
   * operator for the password when none is configured.
   */
  static async loadConfiguration(
    prompter: Prompter,
    env: NodeJS.ProcessEnv = process.env,
    cwd: string = process.cwd()
  ): Promise<ToolConfig> {
    const read = (name: keyof EnvironmentConfig): string | undefined => {
      const value = env[name]?.trim();
      return value ? value : undefined;
    };

    const host = read('DB_HOST') ?? this.deriveHost(read('SUPABASE_URL'));
    const user = read('DB_USER');

    const missingVars = [host ? null : 'DB_HOST', user ? null : 'DB_USER'].filter(
      (name): name is string => name !== null
    );
    if (!host || !user) {
      throw new ConfigurationError(
        `Missing required environment variables: ${missingVars.join(', ')}`,
        missingVars[0]
      );
    }

    const port = this.parsePort(read('DB_PORT'));

    const logLevel = read('LOG_LEVEL') ?? 'info';
    if (!parseLogLevel(logLevel)) {
      throw new ConfigurationError(
        'LOG_LEVEL must be one of: error, warn, info, debug',
        'LOG_LEVEL'
      );
    }

    let password = read('PASS') ?? read('DB_PASSWORD');
    if (!password) {
      password = await prompter.askSecret('Enter your database password: ');
      if (!password) {
        throw new ConfigurationError('Password cannot be empty', 'PASS');
      }
    }

    const config: ToolConfig = {
      connection: {
        host,
        port,
        user,
        password,
        database: read('DB_NAME') ?? DEFAULT_DATABASE,
      },
      backupDir: resolve(cwd, read('BACKUP_DIR') ?? '.'),
      logLevel,
    };

    // Add optional properties only if they exist
    const sslMode = read('DB_SSLMODE');
    if (sslMode) {
      config.connection.sslMode = sslMode;
    }
    const binDir = read('PG_BIN_DIR');
    if (binDir) {
      config.binDir = binDir;
    }
    const restoreDefaultFile = read('RESTORE_DEFAULT_FILE');
    if (restoreDefaultFile) {
      config.restoreDefaultFile = restoreDefaultFile;
    }

    return config;
  }

  /**
   * Derive the direct database host from a project URL:
   * https://<ref>.supabase.co becomes db.<ref>.supabase.co
   */
  static deriveHostFromUrl(projectUrl: string): string {
    let hostname: string;
    try {
      const withScheme = /^[a-z]+:\/\//i.test(projectUrl) ? projectUrl : `https://${projectUrl}`;
      hostname = new URL(withScheme).hostname;
    } catch {
      throw new ConfigurationError(`SUPABASE_URL is not a valid URL: ${projectUrl}`, 'SUPABASE_URL');
    }

    const projectRef = hostname.endsWith(SUPABASE_HOST_SUFFIX)
      ? hostname.slice(0, -SUPABASE_HOST_SUFFIX.length)
      : '';
    if (!projectRef || projectRef.includes('.')) {
      throw new ConfigurationError(
        `SUPABASE_URL must look like https://<project-ref>${SUPABASE_HOST_SUFFIX}`,
        'SUPABASE_URL'
      );
    }

    return `db.${projectRef}${SUPABASE_HOST_SUFFIX}`;
  }

  static sanitizeForLogging(config: ToolConfig): Record<string, unknown> {
    return {
      ...config,
      connection: {
        ...config.connection,
        password: '[REDACTED]',
      },
    };
  }

  private static deriveHost(projectUrl: string | undefined): string | undefined {
    return projectUrl ? this.deriveHostFromUrl(projectUrl) : undefined;
  }

  private static parsePort(value: string | undefined): number {
    if (value === undefined) {
      return DEFAULT_PORT;
    }

    const port = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
    if (isNaN(port) || port < 1 || port > 65535) {
      throw new ConfigurationError('DB_PORT must be an integer between 1 and 65535', 'DB_PORT');
    }
    return port;
  }
}
