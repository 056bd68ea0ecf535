import { Command } from 'commander';
import { AccessCommand } from './access-command';
import { addCallerOptions, addOutputOptions } from '../../base/command-options';
import type { AccessCheckOptions, AccessGrantOptions, AccessRevokeOptions } from './access-command';

export function registerAccessCommands(program: Command): void {
  const accessCommand = new AccessCommand();

  const access = program
    .command('access')
    .description('Manage per-record access grants');

  // medialedger access grant 1 agent:uploader
  addCallerOptions(
    access
      .command('grant <recordId> <principal>')
      .description('Grant a principal access to an owned media record')
  ).action(async (recordId: string, principal: string, options: AccessGrantOptions) => {
    await accessCommand.executeGrant(recordId, principal, options);
  });

  addCallerOptions(
    access
      .command('revoke <recordId> <principal>')
      .description('Revoke a principal\'s access to an owned media record')
  ).action(async (recordId: string, principal: string, options: AccessRevokeOptions) => {
    await accessCommand.executeRevoke(recordId, principal, options);
  });

  addOutputOptions(
    access
      .command('check <recordId> <principal>')
      .description('Check whether a principal has access to a media record')
  ).action(async (recordId: string, principal: string, options: AccessCheckOptions) => {
    await accessCommand.executeCheck(recordId, principal, options);
  });
}
