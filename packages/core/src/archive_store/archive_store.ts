import type { LedgerStores, RecordStore } from '../record_store';
import type { CallContext, MediaMetadata, MediaRecord, Principal, RecordId } from '../types';
import { OwnershipViolationError, RecordNotFoundError } from '../errors';
import { assertMediaMetadata, assertPrincipal } from '../validation/media_validator';
import { createMediaRecord, withMetadata, withOwner } from '../factories/media_record_factory';
import { SequenceGenerator } from '../sequence_generator';
import { AccessMatrix } from '../access_matrix';

/**
 * ArchiveStore - the media record map and its state transitions.
 *
 * Every check of a mutating method runs before its first write, in the order
 * existence, ownership, validation. Atomicity across the three stores is the
 * caller's concern (see LedgerTransaction).
 */
export class ArchiveStore {
  private readonly records: RecordStore<MediaRecord>;
  private readonly sequence: SequenceGenerator;
  private readonly access: AccessMatrix;

  constructor(stores: LedgerStores) {
    this.records = stores.media;
    this.sequence = new SequenceGenerator(stores.sequence);
    this.access = new AccessMatrix(stores.access);
  }

  async create(metadata: MediaMetadata, ctx: CallContext): Promise<RecordId> {
    assertMediaMetadata(metadata);
    const recordId = await this.sequence.next();
    const record = createMediaRecord({
      recordId,
      owner: ctx.caller,
      createdAt: ctx.height,
      metadata,
    });
    await this.records.put(String(recordId), record);
    await this.access.recordCreator(recordId, ctx.caller);
    return recordId;
  }

  async read(recordId: RecordId): Promise<MediaRecord | null> {
    if (!Number.isSafeInteger(recordId) || recordId < 1) return null;
    return this.records.get(String(recordId));
  }

  /**
   * Loads a record and checks that `caller` currently owns it.
   */
  async requireOwned(recordId: RecordId, caller: Principal): Promise<MediaRecord> {
    const record = await this.read(recordId);
    if (!record) {
      throw new RecordNotFoundError(recordId);
    }
    if (record.owner !== caller) {
      throw new OwnershipViolationError(recordId, caller);
    }
    return record;
  }

  async update(recordId: RecordId, metadata: MediaMetadata, ctx: CallContext): Promise<void> {
    const record = await this.requireOwned(recordId, ctx.caller);
    assertMediaMetadata(metadata);
    await this.records.put(String(recordId), withMetadata(record, metadata));
  }

  async transfer(recordId: RecordId, newOwner: Principal, ctx: CallContext): Promise<void> {
    const record = await this.requireOwned(recordId, ctx.caller);
    assertPrincipal(newOwner);
    await this.records.put(String(recordId), withOwner(record, newOwner));
  }

  async delete(recordId: RecordId, ctx: CallContext): Promise<void> {
    await this.requireOwned(recordId, ctx.caller);
    await this.records.delete(String(recordId));
    await this.access.purge(recordId);
  }
}
