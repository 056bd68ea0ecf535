/**
 * Filesystem-dependent implementations
 *
 * Everything here persists under `<ledgerRoot>/.medialedger`.
 * Use @medialedger/core/memory for in-memory alternatives.
 */

// Store
export { FsRecordStore, DEFAULT_ID_ENCODER, createFsLedgerStores } from './record_store/fs';
export type { FsRecordStoreOptions, IdEncoder, FsLedgerStores } from './record_store/fs';

// ConfigStore + ConfigManager Factories
export {
  FsConfigStore,
  // Factory with explicit ledgerRoot (for DI containers)
  createConfigManager,
} from './config_store/fs';

// SessionStore + SessionManager Factories
export {
  FsSessionStore,
  // Factory with explicit ledgerRoot (for DI containers)
  createSessionManager,
} from './session_store/fs';

// Host
export { StoredHeightSource } from './ledger_host/height_source';
export { createFsLedgerHost, LOCK_FILE, FsLedgerLock, LedgerLockTimeoutError } from './ledger_host/fs';
export type { FsLedgerHostOptions, FsLedgerLockOptions, LedgerHostOptions, WiredLedgerHost } from './ledger_host/fs';

// Ledger discovery
export { LEDGER_DIR, findLedgerRoot, getLedgerPath, isLedgerRoot } from './utils/ledger_discovery';
