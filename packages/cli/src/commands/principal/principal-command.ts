import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface PrincipalUseOptions extends BaseCommandOptions {}

export interface PrincipalShowOptions extends BaseCommandOptions {}

export interface PrincipalClearOptions extends BaseCommandOptions {}

export class PrincipalCommand extends BaseCommand {

  register(_program: Command): void {
    // Registration handled by registerPrincipalCommands() in principal.ts
  }

  // [EARS-1] Records the principal later calls are issued as
  async executeUse(principal: string, options: PrincipalUseOptions): Promise<void> {
    try {
      const sessionManager = await this.dependencyService.getSessionManager();
      await sessionManager.setActivePrincipal(principal);

      this.handleSuccess({ activePrincipal: principal }, options, `Active principal: ${principal}`);
    } catch (error) {
      this.handleError(
        `Failed to set active principal: ${this.describeError(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  // [EARS-2] Shows the active principal and the last switch
  async executeShow(options: PrincipalShowOptions): Promise<void> {
    try {
      const sessionManager = await this.dependencyService.getSessionManager();
      const activePrincipal = await sessionManager.getActivePrincipal();
      if (!activePrincipal) {
        this.handleError("No active principal. Run 'medialedger principal use <principal>'.", options);
        return;
      }
      const lastSession = await sessionManager.getLastSession();

      this.handleSuccess(
        { activePrincipal, lastSession },
        options,
        lastSession
          ? `Active principal: ${activePrincipal}\n   Since: ${lastSession.timestamp}`
          : `Active principal: ${activePrincipal}`
      );
    } catch (error) {
      this.handleError(
        `Failed to read session: ${this.describeError(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  // [EARS-3] Forgets the active principal, keeping the last switch
  async executeClear(options: PrincipalClearOptions): Promise<void> {
    try {
      const sessionManager = await this.dependencyService.getSessionManager();
      await sessionManager.clearActivePrincipal();

      this.handleSuccess({ activePrincipal: null }, options, 'Active principal cleared');
    } catch (error) {
      this.handleError(
        `Failed to clear active principal: ${this.describeError(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }
}
