import { ConfigManager } from './config';
import { Logger } from '../utils/cli-utils';
import { AppEnvironment, CommandEnvironment } from '../types/environment';

/**
 * Initialize the application environment.
 * The configuration is looked up in `searchFrom` unless `configPath` names a file.
 */
export async function createAppEnvironment(options?: {
  configPath?: string | undefined;
  searchFrom?: string | undefined;
  quiet?: boolean;
  verbose?: boolean;
}): Promise<AppEnvironment> {
  const logger = new Logger(options?.verbose, options?.quiet);

  const configManager = new ConfigManager();
  const config = await configManager.load({
    configPath: options?.configPath,
    searchFrom: options?.searchFrom,
  });
  const configPath = configManager.getConfigPath();
  logger.debug(configPath ? `Using configuration from ${configPath}` : 'Using default configuration');

  return {
    config,
    configPath,
    logger,
  };
}

/**
 * Create command environment from app environment
 */
export function createCommandEnvironment(
  appEnv: AppEnvironment,
  options?: {
    quiet?: boolean;
    verbose?: boolean;
  }
): CommandEnvironment {
  const commandLogger = new Logger(options?.verbose, options?.quiet);

  return {
    ...appEnv,
    commandLogger,
  };
}
