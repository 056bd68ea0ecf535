import { MemoryRecordStore } from './memory_record_store';
import type { AccessEntry, MediaRecord, SequenceState } from '../../types';

export type MemoryLedgerStores = {
  media: MemoryRecordStore<MediaRecord>;
  access: MemoryRecordStore<AccessEntry>;
  sequence: MemoryRecordStore<SequenceState>;
};

/**
 * Fresh in-memory stores for one ledger. Typed as MemoryRecordStore so tests
 * can use its inspection helpers.
 */
export function createMemoryLedgerStores(): MemoryLedgerStores {
  return {
    media: new MemoryRecordStore<MediaRecord>(),
    access: new MemoryRecordStore<AccessEntry>(),
    sequence: new MemoryRecordStore<SequenceState>(),
  };
}
