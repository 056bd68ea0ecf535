export { LedgerHost, LedgerCaller } from './ledger_host';
export { MemoryHeightSource, StoredHeightSource, HEIGHT_KEY } from './height_source';
export { ok, err } from './ledger_host.types';
export type { CallResult, CallError, HeightSource, LedgerHostDependencies, LedgerLock } from './ledger_host.types';
