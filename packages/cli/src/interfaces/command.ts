/**
 * Standard Command Interface for the MediaLedger CLI
 *
 * All commands implement this interface so they can be registered the same
 * way and tested with a mocked DependencyInjectionService.
 */

import { Command } from 'commander';

/**
 * Base options that all commands support
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Options of commands that issue a call as a principal
 */
export interface CallerCommandOptions extends BaseCommandOptions {
  /** Overrides the session's active principal */
  as?: string;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   */
  register(program: Command): void;
}

/**
 * Executable command interface
 */
export interface IExecutableCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> {
  execute(options: TOptions): Promise<void>;
}
