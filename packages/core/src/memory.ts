/**
 * In-memory implementations (no filesystem required)
 *
 * Suitable for tests and embedding a throwaway ledger in another process.
 */

// Store
export { MemoryRecordStore, createMemoryLedgerStores } from './record_store/memory';
export type { MemoryRecordStoreOptions, MemoryLedgerStores } from './record_store/memory';

// ConfigStore
export { MemoryConfigStore } from './config_store/memory';

// SessionStore
export { MemorySessionStore } from './session_store/memory';

// Host
export { MemoryHeightSource } from './ledger_host/height_source';
export { createMemoryLedgerHost } from './ledger_host/memory';
export type { MemoryLedgerHost } from './ledger_host/memory';
