export { FsRecordStore, DEFAULT_ID_ENCODER } from './fs_record_store';
export type { FsRecordStoreOptions, IdEncoder } from './fs_record_store';
export { createFsLedgerStores } from './fs_ledger_stores';
export type { FsLedgerStores } from './fs_ledger_stores';
