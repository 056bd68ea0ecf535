/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 *
 * NOTE: Session state is handled by MemorySessionStore, not this class.
 */

import type { ConfigStore } from '../config_store';
import type { LedgerConfig } from '../../config_manager/config_manager.types';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ protocolVersion: '1.0', ledgerId: 'demo', ledgerName: 'Demo' });
 * const manager = new ConfigManager(configStore);
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: LedgerConfig | null = null;

  /**
   * [EARS-A1] Returns null if no config set
   * [EARS-A2] Returns config set via setConfig or saveConfig
   */
  async loadConfig(): Promise<LedgerConfig | null> {
    return this.config ? { ...this.config } : null;
  }

  async saveConfig(config: LedgerConfig): Promise<void> {
    this.config = { ...config };
  }

  // ==================== Test Helper Methods ====================

  setConfig(config: LedgerConfig | null): void {
    this.config = config;
  }

  getConfig(): LedgerConfig | null {
    return this.config;
  }

  clear(): void {
    this.config = null;
  }
}
