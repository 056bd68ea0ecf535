import type { RecordStore } from './record_store';
import type { AccessEntry, MediaRecord, SequenceState } from '../types';

/**
 * LedgerStores - Typed container for the persisted ledger state
 *
 * - media: ArchiveStore map, keyed by decimal record id
 * - access: AccessMatrix map, keyed by `<recordId>:<principal>`
 * - sequence: single `total_items` counter
 */
export type LedgerStores = {
  media: RecordStore<MediaRecord>;
  access: RecordStore<AccessEntry>;
  sequence: RecordStore<SequenceState>;
};

/** Key of the single sequence counter entry */
export const SEQUENCE_KEY = 'total_items';
