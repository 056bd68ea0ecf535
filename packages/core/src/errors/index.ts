export * from './ledger_errors';
