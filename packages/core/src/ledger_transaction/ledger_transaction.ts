import type { LedgerStores } from '../record_store';
import type { AccessEntry, MediaRecord, SequenceState } from '../types';
import { StagedRecordStore } from './staged_record_store';

/**
 * LedgerTransaction - one atomic unit over the three ledger stores.
 *
 * Work reads and writes through the staged views. commit() flushes them in the
 * order sequence, media, access: an interrupted commit can leave a gap in the
 * identifier sequence but never reuses an identifier.
 */
export class LedgerTransaction {
  readonly sequence: StagedRecordStore<SequenceState>;
  readonly media: StagedRecordStore<MediaRecord>;
  readonly access: StagedRecordStore<AccessEntry>;
  private settled = false;

  constructor(stores: LedgerStores) {
    this.sequence = new StagedRecordStore(stores.sequence);
    this.media = new StagedRecordStore(stores.media);
    this.access = new StagedRecordStore(stores.access);
  }

  /** The staged views, shaped like the backing stores */
  get stores(): LedgerStores {
    return { media: this.media, access: this.access, sequence: this.sequence };
  }

  isSettled(): boolean {
    return this.settled;
  }

  async commit(): Promise<void> {
    this.assertOpen();
    this.settled = true;
    await this.sequence.commit();
    await this.media.commit();
    await this.access.commit();
  }

  rollback(): void {
    this.assertOpen();
    this.settled = true;
    this.sequence.discard();
    this.media.discard();
    this.access.discard();
  }

  private assertOpen(): void {
    if (this.settled) {
      throw new Error('Transaction already settled');
    }
  }

  /**
   * Runs `work` against a fresh transaction and commits when it resolves.
   * A rejection rolls back every staged write and is rethrown.
   */
  static async run<T>(stores: LedgerStores, work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    const tx = new LedgerTransaction(stores);
    let result: T;
    try {
      result = await work(tx);
    } catch (error) {
      tx.rollback();
      throw error;
    }
    await tx.commit();
    return result;
  }
}
