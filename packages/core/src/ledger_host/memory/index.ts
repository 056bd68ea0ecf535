export { createMemoryLedgerHost } from './memory_ledger_host';
export type { MemoryLedgerHost } from './memory_ledger_host';
