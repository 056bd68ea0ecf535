import { LedgerTransaction } from '../ledger_transaction';
import { ArchiveStore } from '../archive_store';
import { AccessMatrix } from '../access_matrix';
import { SequenceGenerator } from '../sequence_generator';
import { assertPrincipal } from '../validation/media_validator';
import { validatePrincipal } from '../validation/principal_validator';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { LedgerStores } from '../record_store';
import type { IEventStream, MediaLedgerEvent } from '../event_bus';
import type { CallContext, MediaMetadata, MediaRecord, Principal, RecordId } from '../types';
import type { IMediaRegistry, MediaRegistryDependencies } from './media_registry.types';

const EVENT_SOURCE = 'media_registry';

/**
 * MediaRegistry - the ledger's operation surface.
 *
 * Implements Facade + Dependency Injection Pattern. Each call runs inside its
 * own LedgerTransaction; calls on one instance are queued so that no two
 * transactions interleave. Events are published only after a commit.
 */
export class MediaRegistry implements IMediaRegistry {
  private stores: LedgerStores;
  private eventBus: IEventStream;
  private logger: Logger;
  private queue: Promise<void> = Promise.resolve();

  constructor(dependencies: MediaRegistryDependencies) {
    this.stores = dependencies.stores;
    this.eventBus = dependencies.eventBus;
    this.logger = dependencies.logger ?? createLogger('[MediaRegistry] ');
  }

  /**
   * [EARS-A1] Validates metadata, draws the next identifier and stores the
   * record with the caller as owner and creator grant.
   */
  async archiveNewMedia(ctx: CallContext, metadata: MediaMetadata): Promise<RecordId> {
    const recordId = await this.atomic(ctx, (tx) => new ArchiveStore(tx.stores).create(metadata, ctx));

    this.logger.debug(`Archived media record ${recordId} for ${ctx.caller}`);
    this.emit({
      type: 'media.archived',
      timestamp: Date.now(),
      source: EVENT_SOURCE,
      payload: { recordId, owner: ctx.caller, createdAt: ctx.height },
    });
    return recordId;
  }

  async getMediaRecord(recordId: RecordId): Promise<MediaRecord | null> {
    return this.serialize(() => new ArchiveStore(this.stores).read(recordId));
  }

  /**
   * [EARS-B1] Existence, then ownership, then metadata validation.
   */
  async modifyMediaMetadata(ctx: CallContext, recordId: RecordId, metadata: MediaMetadata): Promise<true> {
    await this.atomic(ctx, (tx) => new ArchiveStore(tx.stores).update(recordId, metadata, ctx));

    this.logger.debug(`Modified media record ${recordId}`);
    this.emit({
      type: 'media.metadata.modified',
      timestamp: Date.now(),
      source: EVENT_SOURCE,
      payload: { recordId, triggeredBy: ctx.caller, height: ctx.height },
    });
    return true;
  }

  /**
   * [EARS-C1] Only the owner changes; grants stay as they are.
   */
  async transferMediaOwnership(ctx: CallContext, recordId: RecordId, newOwner: Principal): Promise<true> {
    await this.atomic(ctx, (tx) => new ArchiveStore(tx.stores).transfer(recordId, newOwner, ctx));

    this.logger.debug(`Transferred media record ${recordId} from ${ctx.caller} to ${newOwner}`);
    this.emit({
      type: 'media.ownership.transferred',
      timestamp: Date.now(),
      source: EVENT_SOURCE,
      // Ownership was checked, so the caller was the previous owner
      payload: { recordId, previousOwner: ctx.caller, newOwner, height: ctx.height },
    });
    return true;
  }

  /**
   * [EARS-D1] Removes the record and purges its grants. The identifier is not reissued.
   */
  async removeMediaRecord(ctx: CallContext, recordId: RecordId): Promise<true> {
    await this.atomic(ctx, (tx) => new ArchiveStore(tx.stores).delete(recordId, ctx));

    this.logger.debug(`Removed media record ${recordId}`);
    this.emit({
      type: 'media.removed',
      timestamp: Date.now(),
      source: EVENT_SOURCE,
      payload: { recordId, triggeredBy: ctx.caller, height: ctx.height },
    });
    return true;
  }

  /**
   * [EARS-E1] Owner-gated upsert of a grant.
   */
  async grantAccess(ctx: CallContext, recordId: RecordId, principal: Principal): Promise<true> {
    await this.atomic(ctx, async (tx) => {
      await new ArchiveStore(tx.stores).requireOwned(recordId, ctx.caller);
      assertPrincipal(principal);
      await new AccessMatrix(tx.access).grant(recordId, principal);
    });

    this.logger.debug(`Granted ${principal} access to media record ${recordId}`);
    this.emit({
      type: 'access.granted',
      timestamp: Date.now(),
      source: EVENT_SOURCE,
      payload: { recordId, principal, triggeredBy: ctx.caller },
    });
    return true;
  }

  /**
   * [EARS-E2] Owner-gated removal of a grant. Revoking a missing grant succeeds.
   */
  async revokeAccess(ctx: CallContext, recordId: RecordId, principal: Principal): Promise<true> {
    await this.atomic(ctx, async (tx) => {
      await new ArchiveStore(tx.stores).requireOwned(recordId, ctx.caller);
      assertPrincipal(principal);
      await new AccessMatrix(tx.access).revoke(recordId, principal);
    });

    this.logger.debug(`Revoked ${principal} access to media record ${recordId}`);
    this.emit({
      type: 'access.revoked',
      timestamp: Date.now(),
      source: EVENT_SOURCE,
      payload: { recordId, principal, triggeredBy: ctx.caller },
    });
    return true;
  }

  async checkAccess(recordId: RecordId, principal: Principal): Promise<boolean> {
    if (!validatePrincipal(principal)) return false;
    return this.serialize(async () => {
      const record = await new ArchiveStore(this.stores).read(recordId);
      if (!record) return false;
      return new AccessMatrix(this.stores.access).check(recordId, principal);
    });
  }

  async getTotalItems(): Promise<number> {
    return this.serialize(() => new SequenceGenerator(this.stores.sequence).current());
  }

  // ─────────────────────────────────────────────────────────
  // Private helpers
  // ─────────────────────────────────────────────────────────

  /**
   * Chains `work` behind every call submitted before it.
   */
  private serialize<T>(work: () => Promise<T>): Promise<T> {
    const run = this.queue.then(work);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * One queued transaction. The caller is checked first, since the registry
   * can be driven without a LedgerHost in front of it.
   */
  private atomic<T>(ctx: CallContext, work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    return this.serialize(() => {
      assertPrincipal(ctx.caller);
      return LedgerTransaction.run(this.stores, work);
    });
  }

  private emit(event: MediaLedgerEvent): void {
    this.eventBus.publish(event);
  }
}
