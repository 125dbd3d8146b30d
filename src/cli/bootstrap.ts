import { config as loadDotenv } from 'dotenv';
import { ConfigurationError, ConfigurationManager } from '../config/ConfigurationManager';
import { Logger } from '../clients/Logger';
import { PostgreSQLClient } from '../clients/PostgreSQLClient';
import { CommandRunner as DefaultCommandRunner } from '../clients/CommandRunner';
import { Logger as ILogger } from '../interfaces/Logger';
import { CommandRunner } from '../interfaces/CommandRunner';
import { PostgreSQLClient as IPostgreSQLClient } from '../interfaces/PostgreSQLClient';
import { Prompter } from '../interfaces/Prompter';
import { ConnectionConfig, ToolConfig } from '../interfaces/ToolConfig';

export interface CommonOptions {
  envFile?: string;
  logLevel?: string;
  checkConnection?: boolean;
}

/**
 * Collaborators that tests replace; production defaults otherwise
 */
export interface ToolDependencies {
  prompter?: Prompter;
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  createLogger?: (level: string) => ILogger;
  createConnectionProbe?: (connection: ConnectionConfig, logger: ILogger) => IPostgreSQLClient;
}

export interface ToolContext {
  config: ToolConfig;
  logger: ILogger;
  runner: CommandRunner;
}

/**
 * Load a .env file into the process environment. Variables already set win.
 */
export function loadEnvFile(path?: string): void {
  const result = loadDotenv(path ? { path } : {});
  if (result.error && path) {
    console.warn(`Could not read env file ${path}: ${result.error.message}`);
  }
}

/**
 * Load configuration, set up logging and run the optional connection check.
 * Returns null when the run must stop; the reason has been reported.
 */
export async function bootstrap(
  options: CommonOptions,
  prompter: Prompter,
  deps: ToolDependencies = {}
): Promise<ToolContext | null> {
  const createLogger = deps.createLogger ?? ((level: string) => Logger.create(level));
  let logger = createLogger(options.logLevel ?? 'info');

  let config: ToolConfig;
  try {
    config = await ConfigurationManager.loadConfiguration(prompter, deps.env, deps.cwd);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`Configuration error: ${error.message}`, error);
      return null;
    }
    throw error;
  }

  // Reconfigure logger with the configured level unless the flag set one
  if (!options.logLevel) {
    logger = createLogger(config.logLevel);
  }
  logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));

  if (options.checkConnection) {
    const probe = deps.createConnectionProbe
      ? deps.createConnectionProbe(config.connection, logger)
      : new PostgreSQLClient(config.connection, logger);

    logger.info(`Checking connection to ${config.connection.host}:${config.connection.port}...`);
    if (!(await probe.testConnection())) {
      logger.error('Could not connect with the configured credentials; nothing was run');
      return null;
    }
  }

  return {
    config,
    logger,
    runner: deps.runner ?? new DefaultCommandRunner(),
  };
}
