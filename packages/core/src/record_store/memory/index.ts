export { MemoryRecordStore } from './memory_record_store';
export type { MemoryRecordStoreOptions } from './memory_record_store';
export { createMemoryLedgerStores } from './memory_ledger_stores';
export type { MemoryLedgerStores } from './memory_ledger_stores';
