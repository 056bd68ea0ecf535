export { ConfigManager, PROTOCOL_VERSION } from './config_manager';
export type { IConfigManager, LedgerConfig } from './config_manager.types';
export type { ConfigStore } from '../config_store';
