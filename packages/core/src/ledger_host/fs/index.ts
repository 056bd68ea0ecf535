export { createFsLedgerHost, LOCK_FILE } from './fs_ledger_host';
export type { FsLedgerHostOptions, LedgerHostOptions, WiredLedgerHost } from './fs_ledger_host';
export { FsLedgerLock, LedgerLockTimeoutError } from './fs_ledger_lock';
export type { FsLedgerLockOptions } from './fs_ledger_lock';
