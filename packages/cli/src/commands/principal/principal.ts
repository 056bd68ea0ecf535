import { Command } from 'commander';
import { PrincipalCommand } from './principal-command';
import type { PrincipalClearOptions, PrincipalShowOptions, PrincipalUseOptions } from './principal-command';

export function registerPrincipalCommands(program: Command): void {
  const principalCommand = new PrincipalCommand();

  const principal = program
    .command('principal')
    .description('Manage the principal that calls are issued as')
    .alias('p');

  // medialedger principal use human:alice
  principal
    .command('use <principal>')
    .description('Set the active principal for this machine')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (principalId: string, options: PrincipalUseOptions) => {
      await principalCommand.executeUse(principalId, options);
    });

  principal
    .command('show')
    .description('Show the active principal')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (options: PrincipalShowOptions) => {
      await principalCommand.executeShow(options);
    });

  principal
    .command('clear')
    .description('Forget the active principal')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (options: PrincipalClearOptions) => {
      await principalCommand.executeClear(options);
    });
}
