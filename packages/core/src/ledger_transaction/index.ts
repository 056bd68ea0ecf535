export { StagedRecordStore } from './staged_record_store';
export { LedgerTransaction } from './ledger_transaction';
