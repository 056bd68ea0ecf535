import type { RecordStore } from '../record_store';
import type { AccessEntry, Principal, RecordId } from '../types';
import { createAccessEntry } from '../factories/media_record_factory';

/**
 * Builds the store key of a grant: `<recordId>:<principal>`.
 */
export function accessKey(recordId: RecordId, principal: Principal): string {
  return `${recordId}:${principal}`;
}

/**
 * AccessMatrix - per-record grants keyed by (recordId, principal).
 *
 * Holds no authorization logic of its own: callers gate grant/revoke on
 * record ownership before reaching it.
 */
export class AccessMatrix {
  constructor(private readonly store: RecordStore<AccessEntry>) {}

  /**
   * Inserts the creator's grant while a record is being created.
   */
  async recordCreator(recordId: RecordId, principal: Principal): Promise<void> {
    await this.store.put(accessKey(recordId, principal), createAccessEntry(recordId, principal));
  }

  /** Idempotent: granting twice leaves a single entry. */
  async grant(recordId: RecordId, principal: Principal): Promise<void> {
    await this.store.put(accessKey(recordId, principal), createAccessEntry(recordId, principal));
  }

  /** Idempotent: revoking a missing grant is not an error. */
  async revoke(recordId: RecordId, principal: Principal): Promise<void> {
    await this.store.delete(accessKey(recordId, principal));
  }

  async check(recordId: RecordId, principal: Principal): Promise<boolean> {
    const entry = await this.store.get(accessKey(recordId, principal));
    return entry !== null && entry.canAccess;
  }

  /**
   * Removes every grant of a record. Returns the number of entries removed.
   */
  async purge(recordId: RecordId): Promise<number> {
    const prefix = `${recordId}:`;
    const keys = (await this.store.list()).filter((key) => key.startsWith(prefix));
    for (const key of keys) {
      await this.store.delete(key);
    }
    return keys.length;
  }
}
