import { isLedgerCallError } from '../errors';
import { assertPrincipal } from '../validation/media_validator';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { IMediaRegistry } from '../media_registry';
import type { CallContext, MediaMetadata, MediaRecord, Principal, RecordId } from '../types';
import { err, ok } from './ledger_host.types';
import type { CallResult, HeightSource, LedgerHostDependencies, LedgerLock } from './ledger_host.types';

/** Single-process hosts rely on the registry's own queue */
const NO_LOCK: LedgerLock = {
  withLock: (work) => work(),
};

/**
 * LedgerHost - the execution environment around a MediaRegistry.
 *
 * Binds a caller identity, stamps every mutating call with a fresh height and
 * turns LedgerCallErrors into `err` results. Every call runs under the
 * optional LedgerLock, so hosts in separate processes never interleave. Anything else (I/O failures,
 * corrupted stored values) is rethrown.
 */
export class LedgerHost {
  private registry: IMediaRegistry;
  private heights: HeightSource;
  private lock: LedgerLock;
  private logger: Logger;

  constructor(dependencies: LedgerHostDependencies) {
    this.registry = dependencies.registry;
    this.heights = dependencies.heights;
    this.lock = dependencies.lock ?? NO_LOCK;
    this.logger = dependencies.logger ?? createLogger('[LedgerHost] ');
  }

  /**
   * Returns a handle that issues calls as `caller`.
   * Throws InvalidPrincipalError for a malformed identity.
   */
  as(caller: Principal): LedgerCaller {
    return new LedgerCaller(assertPrincipal(caller), this);
  }

  getMediaRecord(recordId: RecordId): Promise<MediaRecord | null> {
    return this.lock.withLock(() => this.registry.getMediaRecord(recordId));
  }

  checkAccess(recordId: RecordId, principal: Principal): Promise<boolean> {
    return this.lock.withLock(() => this.registry.checkAccess(recordId, principal));
  }

  getTotalItems(): Promise<number> {
    return this.lock.withLock(() => this.registry.getTotalItems());
  }

  /** @internal used by LedgerCaller */
  async invoke<T>(
    operation: string,
    caller: Principal,
    call: (registry: IMediaRegistry, ctx: CallContext) => Promise<T>
  ): Promise<CallResult<T>> {
    return this.lock.withLock(async () => {
      const ctx: CallContext = { caller, height: await this.heights.next() };
      try {
        return ok(await call(this.registry, ctx));
      } catch (error) {
        if (!isLedgerCallError(error)) throw error;
        this.logger.debug(`${operation} by ${caller} rejected: ${error.code}`);
        return err({ code: error.code, kind: error.kind, message: error.message });
      }
    });
  }
}

/**
 * A LedgerHost bound to one caller. Methods mirror IMediaRegistry without the
 * call context.
 */
export class LedgerCaller {
  constructor(
    readonly principal: Principal,
    private readonly host: LedgerHost
  ) {}

  archiveNewMedia(metadata: MediaMetadata): Promise<CallResult<RecordId>> {
    return this.host.invoke('archiveNewMedia', this.principal, (registry, ctx) =>
      registry.archiveNewMedia(ctx, metadata)
    );
  }

  modifyMediaMetadata(recordId: RecordId, metadata: MediaMetadata): Promise<CallResult<true>> {
    return this.host.invoke('modifyMediaMetadata', this.principal, (registry, ctx) =>
      registry.modifyMediaMetadata(ctx, recordId, metadata)
    );
  }

  transferMediaOwnership(recordId: RecordId, newOwner: Principal): Promise<CallResult<true>> {
    return this.host.invoke('transferMediaOwnership', this.principal, (registry, ctx) =>
      registry.transferMediaOwnership(ctx, recordId, newOwner)
    );
  }

  removeMediaRecord(recordId: RecordId): Promise<CallResult<true>> {
    return this.host.invoke('removeMediaRecord', this.principal, (registry, ctx) =>
      registry.removeMediaRecord(ctx, recordId)
    );
  }

  grantAccess(recordId: RecordId, principal: Principal): Promise<CallResult<true>> {
    return this.host.invoke('grantAccess', this.principal, (registry, ctx) =>
      registry.grantAccess(ctx, recordId, principal)
    );
  }

  revokeAccess(recordId: RecordId, principal: Principal): Promise<CallResult<true>> {
    return this.host.invoke('revokeAccess', this.principal, (registry, ctx) =>
      registry.revokeAccess(ctx, recordId, principal)
    );
  }

  getMediaRecord(recordId: RecordId): Promise<MediaRecord | null> {
    return this.host.getMediaRecord(recordId);
  }
}
