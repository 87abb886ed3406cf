import { Command as CommanderCommand, OptionValues } from 'commander';
import { createAppEnvironment, createCommandEnvironment } from '../core/environment';
import { AppEnvironment, CommandEnvironment } from '../types/environment';
import { Logger } from '../utils/cli-utils';
import { createErrorHandler, ErrorHandler } from '../utils/error-handler';
import { AsyncReader } from '../types/reader';
import { BaseCommandOptions, WithRepository } from '../types/command';

/**
 * Global options declared on the root program
 */
interface GlobalOptions {
  config?: string;
  verbose: boolean;
  quiet: boolean;
}

function readGlobalOptions(opts: OptionValues): GlobalOptions {
  const config = opts['config'];
  return {
    ...(typeof config === 'string' ? { config } : {}),
    verbose: Boolean(opts['verbose']),
    quiet: Boolean(opts['quiet']),
  };
}

/**
 * Logger configured from the parsed global options
 */
export function createGlobalLogger(opts: OptionValues): Logger {
  const { verbose, quiet } = readGlobalOptions(opts);
  return new Logger(verbose, quiet);
}

function isJsonOutputMode<TOptions extends BaseCommandOptions>(options: TOptions): boolean {
  return Boolean(options.json);
}

/**
 * Creates application environment with appropriate settings.
 * JSON output silences logging so stdout stays machine-readable.
 */
async function createAppEnv(
  globals: GlobalOptions,
  repositoryPath: string,
  isJsonOutput: boolean
): Promise<AppEnvironment> {
  return await createAppEnvironment({
    configPath: globals.config,
    searchFrom: repositoryPath,
    quiet: globals.quiet || isJsonOutput,
    verbose: globals.verbose && !isJsonOutput,
  });
}

function createCmdEnv(appEnv: AppEnvironment, globals: GlobalOptions, isJsonOutput: boolean): CommandEnvironment {
  return createCommandEnvironment(appEnv, {
    quiet: globals.quiet || isJsonOutput,
    verbose: globals.verbose && !isJsonOutput,
  });
}

/**
 * Logs the error with its code and recovery actions, then exits with the code's exit status
 */
function handleCommandError(error: unknown, globals: GlobalOptions): never {
  const logger = new Logger(globals.verbose, globals.quiet);
  const errorHandler: ErrorHandler = createErrorHandler(logger);
  errorHandler.handleError(errorHandler.normalize(error));
}

/**
 * Adapt a repository command to a commander action `(path, options, command)`.
 * Builds the environment from the global options, then runs the command reader.
 */
export function withEnvironment<TOptions extends BaseCommandOptions>(
  commandReader: (options: WithRepository<TOptions>) => AsyncReader<CommandEnvironment, void>
) {
  return async (repositoryPath: string, options: TOptions, command: CommanderCommand): Promise<void> => {
    const globals = readGlobalOptions(command.optsWithGlobals());

    try {
      const mergedOptions: WithRepository<TOptions> = { ...options, repositoryPath };
      const isJsonOutput = isJsonOutputMode(mergedOptions);

      const appEnv = await createAppEnv(globals, repositoryPath, isJsonOutput);
      const commandEnv = createCmdEnv(appEnv, globals, isJsonOutput);

      const readerFn = commandReader(mergedOptions);
      await readerFn(commandEnv);
    } catch (error) {
      handleCommandError(error, globals);
    }
  };
}
