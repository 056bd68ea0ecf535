/**
 * ConfigManager Types
 */

import type { LogLevel } from '../logger';

/**
 * Ledger configuration stored in .medialedger/config.json
 */
export type LedgerConfig = {
  protocolVersion: string;
  ledgerId: string;
  ledgerName: string;
  logLevel?: LogLevel;
};

/**
 * IConfigManager interface
 *
 * Provides typed access to the ledger configuration.
 */
export interface IConfigManager {
  /**
   * Load ledger configuration. Null when the ledger has not been initialized.
   */
  loadConfig(): Promise<LedgerConfig | null>;

  /**
   * Persist a validated configuration
   */
  saveConfig(config: LedgerConfig): Promise<void>;

  /**
   * Get ledger identity from configuration
   */
  getLedgerInfo(): Promise<{ id: string; name: string } | null>;

  /**
   * Get the configured log level, if any
   */
  getLogLevel(): Promise<LogLevel | null>;
}
