/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Handles persistence of .medialedger/config.json.
 *
 * NOTE: Session state (.session.json) is handled by FsSessionStore.
 */

import * as path from 'path';
import type { ConfigStore } from '../config_store';
import type { LedgerConfig } from '../../config_manager/config_manager.types';
import { ConfigManager } from '../../config_manager/config_manager';
import { DetailedValidationError } from '../../record_schemas/errors';
import { isLedgerConfig, validateLedgerConfigDetailed } from '../../validation/record_validator';
import { getLedgerPath } from '../../utils/ledger_discovery';
import { readJsonFile, writeJsonFile } from '../../utils/json_file';

/**
 * Filesystem-based ConfigStore implementation.
 *
 * A missing file means the ledger is not initialized (null). A file that is
 * not valid JSON or does not match the config schema is an error.
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore('/path/to/ledger');
 * const config = await store.loadConfig();
 * if (config) {
 *   console.log(config.ledgerName);
 * }
 * ```
 */
export class FsConfigStore implements ConfigStore {
  private readonly configPath: string;

  constructor(ledgerRootPath: string) {
    this.configPath = path.join(getLedgerPath(ledgerRootPath), 'config.json');
  }

  /**
   * [EARS-A1] Returns the LedgerConfig for valid files
   * [EARS-A2] Returns null for non-existent files
   * [EARS-A3] Throws DetailedValidationError for files that fail the schema
   */
  async loadConfig(): Promise<LedgerConfig | null> {
    const data = await readJsonFile(this.configPath);
    if (data === null) return null;
    if (!isLedgerConfig(data)) {
      throw new DetailedValidationError('LedgerConfig', validateLedgerConfigDetailed(data).errors);
    }
    return data;
  }

  /**
   * [EARS-B1] Writes config.json with JSON indentation, creating .medialedger if needed
   */
  async saveConfig(config: LedgerConfig): Promise<void> {
    await writeJsonFile(this.configPath, config);
  }
}

/**
 * Create a ConfigManager backed by FsConfigStore.
 */
export function createConfigManager(ledgerRoot: string): ConfigManager {
  return new ConfigManager(new FsConfigStore(ledgerRoot));
}
