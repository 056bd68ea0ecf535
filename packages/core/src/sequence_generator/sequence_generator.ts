import type { RecordStore } from '../record_store';
import { SEQUENCE_KEY } from '../record_store';
import type { RecordId, SequenceState } from '../types';

/**
 * Issues record identifiers from the persisted `total_items` counter.
 *
 * next() only stages the incremented counter on the store it was given; inside
 * a LedgerTransaction the increment is discarded with the rest of a failed call.
 */
export class SequenceGenerator {
  constructor(private readonly store: RecordStore<SequenceState>) {}

  async current(): Promise<number> {
    const state = await this.store.get(SEQUENCE_KEY);
    return state ? state.totalItems : 0;
  }

  async next(): Promise<RecordId> {
    const next = (await this.current()) + 1;
    if (!Number.isSafeInteger(next)) {
      throw new Error('Record identifier sequence exhausted');
    }
    await this.store.put(SEQUENCE_KEY, { totalItems: next });
    return next;
  }
}
