import { Command } from 'commander';
import { InitCommand } from './init-command';
import type { InitCommandOptions } from './init-command';

/**
 * Registers init command
 */
export function registerInitCommands(program: Command): void {
  const initCommand = new InitCommand();

  program
    .command('init')
    .description('Initialize a media ledger in the current directory')
    .requiredOption('-n, --name <name>', 'Ledger display name')
    .option('-i, --id <id>', 'Ledger id (default: derived from the name)')
    .option('-l, --log-level <level>', 'Log level: debug, info, warn, error or silent')
    .option('--json', 'Output in JSON format for automation')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Minimal output for scripting')
    .action(async (options: InitCommandOptions) => {
      await initCommand.execute(options);
    });
}
