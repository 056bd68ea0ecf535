import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions, CallerCommandOptions } from '../../interfaces/command';

export interface AccessGrantOptions extends CallerCommandOptions {}

export interface AccessRevokeOptions extends CallerCommandOptions {}

export interface AccessCheckOptions extends BaseCommandOptions {}

export class AccessCommand extends BaseCommand<CallerCommandOptions> {

  register(_program: Command): void {
    // Registration handled by registerAccessCommands() in access.ts
  }

  // [EARS-1] Owner grants a principal access to a record
  async executeGrant(rawRecordId: string, principal: string, options: AccessGrantOptions): Promise<void> {
    const recordId = this.parseRecordId(rawRecordId, options);
    if (recordId === null) return;

    try {
      const caller = await this.callerFor(options);
      const result = await caller.grantAccess(recordId, principal);
      if (!result.ok) {
        this.handleCallError('grant access', result.error, options);
        return;
      }

      this.handleSuccess(
        { recordId, principal, canAccess: true },
        options,
        `Access granted: ${principal} on media record ${recordId}`
      );
    } catch (error) {
      this.handleError(
        `Failed to grant access: ${this.describeError(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  // [EARS-2] Owner revokes a principal's access to a record
  async executeRevoke(rawRecordId: string, principal: string, options: AccessRevokeOptions): Promise<void> {
    const recordId = this.parseRecordId(rawRecordId, options);
    if (recordId === null) return;

    try {
      const caller = await this.callerFor(options);
      const result = await caller.revokeAccess(recordId, principal);
      if (!result.ok) {
        this.handleCallError('revoke access', result.error, options);
        return;
      }

      this.handleSuccess(
        { recordId, principal, canAccess: false },
        options,
        `Access revoked: ${principal} on media record ${recordId}`
      );
    } catch (error) {
      this.handleError(
        `Failed to revoke access: ${this.describeError(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  // [EARS-3] Anyone may ask whether a principal holds access
  async executeCheck(rawRecordId: string, principal: string, options: AccessCheckOptions): Promise<void> {
    const recordId = this.parseRecordId(rawRecordId, options);
    if (recordId === null) return;

    try {
      const host = await this.dependencyService.getLedgerHost();
      const canAccess = await host.checkAccess(recordId, principal);

      this.handleSuccess(
        { recordId, principal, canAccess },
        options,
        canAccess
          ? `${principal} has access to media record ${recordId}`
          : `${principal} has no access to media record ${recordId}`
      );
    } catch (error) {
      this.handleError(
        `Failed to check access: ${this.describeError(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }
}
