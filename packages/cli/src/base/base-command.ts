/**
 * Base Command Class for the MediaLedger CLI
 *
 * Provides consistent output and error handling across commands and gives
 * each command access to the DependencyInjectionService.
 */

import { Command } from 'commander';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, CallerCommandOptions, ICommand, IExecutableCommand } from '../interfaces/command';
import type { Host } from '@medialedger/core';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand {

  protected readonly dependencyService = DependencyInjectionService.getInstance();

  /**
   * Register the command with Commander.js
   */
  abstract register(program: Command): void;

  /**
   * Resolves the caller (--as, else the session's active principal) and
   * returns a host handle bound to it.
   */
  protected async callerFor(options: CallerCommandOptions): Promise<Host.LedgerCaller> {
    if (options.verbose) {
      await this.dependencyService.setVerbose();
    }
    const principal = await this.dependencyService.resolveCaller(options.as);
    const host = await this.dependencyService.getLedgerHost();
    return host.as(principal);
  }

  /**
   * Reports a rejected ledger call.
   */
  protected handleCallError(action: string, error: Host.CallError, options: TOptions): void {
    this.handleError(`Failed to ${action}: [${error.code}] ${error.message}`, options, undefined, 2);
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode
      }, null, 2));
    } else {
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string): void {
    const isJson = options.json || false;
    const isQuiet = options.quiet || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else {
      if (message && !isQuiet) {
        console.log(`✅ ${message}`);
      }
      if (data && !isQuiet && typeof data === 'string') {
        console.log(data);
      }
    }
  }

  /**
   * Parses a positive integer record id, reporting anything else as an error.
   */
  protected parseRecordId(raw: string, options: TOptions): number | null {
    const recordId = Number(raw);
    if (!/^[1-9][0-9]*$/.test(raw) || !Number.isSafeInteger(recordId)) {
      this.handleError(`Invalid record id: "${raw}"`, options);
      return null;
    }
    return recordId;
  }

  protected describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * Command class for commands without sub-commands
 */
export abstract class SimpleCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  extends BaseCommand<TOptions> implements IExecutableCommand<TOptions> {

  abstract execute(options: TOptions): Promise<void>;
}
