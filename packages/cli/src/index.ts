#!/usr/bin/env node

import { Command } from 'commander';
import { registerInitCommands } from './commands/init/init';
import { registerPrincipalCommands } from './commands/principal/principal';
import { registerMediaCommands } from './commands/media/media';
import { registerAccessCommands } from './commands/access/access';
import { DependencyInjectionService } from './services/dependency-injection';

const program = new Command();

program
  .name('medialedger')
  .description('MediaLedger CLI - ownership-gated media metadata registry')
  .version('1.0.0');

registerInitCommands(program);
registerPrincipalCommands(program);
registerMediaCommands(program);
registerAccessCommands(program);

program
  .parseAsync()
  .then(() => DependencyInjectionService.getInstance().drainEvents())
  .catch((error: unknown) => {
    console.error("❌ Fatal error:", error);
    process.exit(1);
  });
