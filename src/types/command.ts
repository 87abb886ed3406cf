import { CommandEnvironment } from './environment';
import { AsyncReader } from './reader';

/**
 * Base type for all command options
 */
export interface BaseCommandOptions {
  json?: boolean;
}

/**
 * Options of a command that operates on one repository directory (the positional argument)
 */
export type WithRepository<TOptions extends BaseCommandOptions> = TOptions & {
  repositoryPath: string;
};

/**
 * Command is a Reader function that reads from CommandEnvironment
 * and accepts options to produce some result
 */
export type Command<TOptions extends BaseCommandOptions, TResult = void> = (
  options: TOptions
) => AsyncReader<CommandEnvironment, TResult>;

/**
 * Simple command that doesn't return a value
 */
export type VoidCommand<TOptions extends BaseCommandOptions> = Command<TOptions, void>;
