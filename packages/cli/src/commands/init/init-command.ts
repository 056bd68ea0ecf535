import * as path from 'path';
import { Command } from 'commander';
import { Config, Logger } from '@medialedger/core';
import { LEDGER_DIR } from '@medialedger/core/fs';
import { SimpleCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface InitCommandOptions extends BaseCommandOptions {
  name: string;
  id?: string;
  logLevel?: string;
}

/**
 * Derives a ledger id from its display name: "Studio Archive" -> "studio-archive".
 */
export function toLedgerId(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 64);
  return slug || 'ledger';
}

export class InitCommand extends SimpleCommand<InitCommandOptions> {

  register(_program: Command): void {
    // Registration handled by registerInitCommands() in init.ts
  }

  // [EARS-1] Writes .medialedger/config.json in the working directory
  // [EARS-2] Refuses to re-initialize an existing ledger
  async execute(options: InitCommandOptions): Promise<void> {
    const root = process.cwd();
    try {
      const { logLevel } = options;
      if (logLevel !== undefined && !Logger.isLogLevel(logLevel)) {
        this.handleError(`Invalid log level: "${logLevel}"`, options);
        return;
      }

      const configManager = this.dependencyService.getConfigManagerAt(root);
      const existing = await configManager.loadConfig();
      if (existing) {
        this.handleError(`Ledger already initialized: ${existing.ledgerId}`, options);
        return;
      }

      const config: Config.LedgerConfig = {
        protocolVersion: Config.PROTOCOL_VERSION,
        ledgerId: options.id ?? toLedgerId(options.name),
        ledgerName: options.name,
        ...(logLevel !== undefined ? { logLevel } : {}),
      };
      await configManager.saveConfig(config);

      const ledgerPath = path.join(root, LEDGER_DIR);
      this.handleSuccess(
        { ledgerId: config.ledgerId, ledgerName: config.ledgerName, ledgerPath },
        options,
        `Ledger initialized: ${config.ledgerId}\n   Name: ${config.ledgerName}\n   Path: ${ledgerPath}`
      );
    } catch (error) {
      this.handleError(
        `Failed to initialize ledger: ${this.describeError(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }
}
