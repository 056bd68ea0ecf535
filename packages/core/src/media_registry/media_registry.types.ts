import type { LedgerStores } from '../record_store';
import type { IEventStream } from '../event_bus';
import type { Logger } from '../logger';
import type { CallContext, MediaMetadata, MediaRecord, Principal, RecordId } from '../types';

/**
 * MediaRegistry Dependencies - Facade + Dependency Injection Pattern
 */
export interface MediaRegistryDependencies {
  // Data Layer
  stores: LedgerStores;

  // Infrastructure Layer
  eventBus: IEventStream; // For emitting events after commit
  logger?: Logger;
}

/**
 * MediaRegistry Interface - the public operation surface of the ledger.
 *
 * Mutating operations run as one atomic unit each and reject with a
 * LedgerCallError subclass when a check fails.
 */
export interface IMediaRegistry {
  /**
   * Registers a new record owned by the caller. Resolves to its identifier.
   */
  archiveNewMedia(ctx: CallContext, metadata: MediaMetadata): Promise<RecordId>;

  /**
   * Reads a record without authorization. Null when absent.
   */
  getMediaRecord(recordId: RecordId): Promise<MediaRecord | null>;

  /**
   * Replaces name, byteCount, summary and labels. Owner only.
   */
  modifyMediaMetadata(ctx: CallContext, recordId: RecordId, metadata: MediaMetadata): Promise<true>;

  /**
   * Hands the record to another principal. Owner only.
   */
  transferMediaOwnership(ctx: CallContext, recordId: RecordId, newOwner: Principal): Promise<true>;

  /**
   * Deletes the record and its grants. Owner only.
   */
  removeMediaRecord(ctx: CallContext, recordId: RecordId): Promise<true>;

  grantAccess(ctx: CallContext, recordId: RecordId, principal: Principal): Promise<true>;

  revokeAccess(ctx: CallContext, recordId: RecordId, principal: Principal): Promise<true>;

  /**
   * Ungated lookup of a grant. False for unknown records and principals.
   */
  checkAccess(recordId: RecordId, principal: Principal): Promise<boolean>;

  /**
   * Number of identifiers issued so far (deleted records included).
   */
  getTotalItems(): Promise<number>;
}
