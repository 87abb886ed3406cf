import { Logger } from '../utils/cli-utils';
import { ReadinessConfig } from './index';

/**
 * Application-wide environment, created once per process
 */
export interface AppEnvironment {
  config: ReadinessConfig;
  configPath: string | null; // file the configuration came from, null for defaults
  logger: Logger;
}

/**
 * Environment handed to a single command
 */
export interface CommandEnvironment extends AppEnvironment {
  commandLogger: Logger;
}
