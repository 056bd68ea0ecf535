/**
 * ConfigManager - Ledger Configuration Manager
 *
 * Provides typed access to the ledger configuration (config.json).
 * Uses ConfigStore abstraction for backend-agnostic persistence.
 *
 * NOTE: Session state (.session.json) is handled by SessionManager, not ConfigManager.
 */

import type { ConfigStore } from '../config_store/config_store';
import { DetailedValidationError } from '../record_schemas/errors';
import { validateLedgerConfigDetailed } from '../validation/record_validator';
import type { LogLevel } from '../logger';
import type { IConfigManager, LedgerConfig } from './config_manager.types';

export const PROTOCOL_VERSION = '1.0';

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * // Production usage
 * import { FsConfigStore } from '@medialedger/core/fs';
 * const configManager = new ConfigManager(new FsConfigStore('/path/to/ledger'));
 *
 * // Test usage
 * import { MemoryConfigStore } from '@medialedger/core/memory';
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ protocolVersion: '1.0', ledgerId: 'demo', ledgerName: 'Demo' });
 * const configManager = new ConfigManager(configStore);
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;

  constructor(configStore: ConfigStore) {
    this.configStore = configStore;
  }

  async loadConfig(): Promise<LedgerConfig | null> {
    return this.configStore.loadConfig();
  }

  /**
   * [EARS-B1] Rejects configurations that do not match the config schema
   */
  async saveConfig(config: LedgerConfig): Promise<void> {
    const validation = validateLedgerConfigDetailed(config);
    if (!validation.isValid) {
      throw new DetailedValidationError('LedgerConfig', validation.errors);
    }
    await this.configStore.saveConfig(config);
  }

  async getLedgerInfo(): Promise<{ id: string; name: string } | null> {
    const config = await this.loadConfig();
    if (!config) return null;

    return {
      id: config.ledgerId,
      name: config.ledgerName
    };
  }

  async getLogLevel(): Promise<LogLevel | null> {
    const config = await this.loadConfig();
    return config?.logLevel ?? null;
  }
}
