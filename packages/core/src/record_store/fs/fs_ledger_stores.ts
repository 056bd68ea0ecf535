import * as path from 'path';
import { FsRecordStore, DEFAULT_ID_ENCODER } from './fs_record_store';
import type { LedgerStores, RecordStore } from '../index';
import type { HeightState } from '../../types';
import {
  loadAccessEntry,
  loadHeightState,
  loadMediaRecord,
  loadSequenceState,
} from '../../factories/media_record_factory';
import { getLedgerPath } from '../../utils/ledger_discovery';

export type FsLedgerStores = {
  stores: LedgerStores;
  /** Backing store for StoredHeightSource */
  heights: RecordStore<HeightState>;
};

/**
 * Builds the filesystem stores of a ledger rooted at `ledgerRoot`:
 *
 * - .medialedger/media/<recordId>.json
 * - .medialedger/access/<recordId>_<kind>_<slug>.json
 * - .medialedger/sequence/total_items.json
 * - .medialedger/host/height.json
 *
 * Every value read back is checked against its JSON schema.
 */
export function createFsLedgerStores(ledgerRoot: string): FsLedgerStores {
  const base = getLedgerPath(ledgerRoot);
  return {
    stores: {
      media: new FsRecordStore({ basePath: path.join(base, 'media'), load: loadMediaRecord }),
      access: new FsRecordStore({
        basePath: path.join(base, 'access'),
        load: loadAccessEntry,
        idEncoder: DEFAULT_ID_ENCODER,
      }),
      sequence: new FsRecordStore({ basePath: path.join(base, 'sequence'), load: loadSequenceState }),
    },
    heights: new FsRecordStore({ basePath: path.join(base, 'host'), load: loadHeightState }),
  };
}
