/**
 * ConfigStore Interface
 *
 * Abstraction for config.json persistence (filesystem, or memory for tests).
 *
 * NOTE: Session state (.session.json) is handled by SessionStore, not ConfigStore.
 * Config is shared by everyone using the ledger; session is machine-local.
 */

import type { LedgerConfig } from '../config_manager/config_manager.types';

/**
 * Implementations:
 * - FsConfigStore: Filesystem-based (.medialedger/config.json)
 * - MemoryConfigStore: In-memory for tests
 */
export interface ConfigStore {
  /**
   * Load ledger configuration from config.json
   *
   * @returns LedgerConfig or null if the ledger is not initialized
   */
  loadConfig(): Promise<LedgerConfig | null>;

  /**
   * Save ledger configuration to config.json
   */
  saveConfig(config: LedgerConfig): Promise<void>;
}
