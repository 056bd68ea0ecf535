import { Command } from 'commander';

/**
 * --json, --verbose and --quiet
 */
export function addOutputOptions(command: Command): Command {
  return command
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output');
}

/**
 * Output options plus --as for commands that issue a ledger call
 */
export function addCallerOptions(command: Command): Command {
  return addOutputOptions(
    command.option('--as <principal>', 'Issue the call as this principal instead of the active one')
  );
}
