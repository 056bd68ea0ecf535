import MediaRecordSchema from './media_record_schema.json';
import AccessEntrySchema from './access_entry_schema.json';
import SequenceStateSchema from './sequence_state_schema.json';
import HeightStateSchema from './height_state_schema.json';
import LedgerConfigSchema from './ledger_config_schema.json';
import LedgerSessionSchema from './ledger_session_schema.json';

export const Schemas = {
  MediaRecord: MediaRecordSchema,
  AccessEntry: AccessEntrySchema,
  SequenceState: SequenceStateSchema,
  HeightState: HeightStateSchema,
  LedgerConfig: LedgerConfigSchema,
  LedgerSession: LedgerSessionSchema,
};

export type SchemaName = keyof typeof Schemas;

export { SchemaValidationCache } from './schema_cache';
export { DetailedValidationError } from './errors';
