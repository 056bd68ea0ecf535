/**
 * MemorySessionStore - In-memory implementation of SessionStore
 */

import type { SessionStore } from '../session_store';
import type { LedgerSession } from '../../session_manager/session_manager.types';

export class MemorySessionStore implements SessionStore {
  private session: LedgerSession | null = null;

  async loadSession(): Promise<LedgerSession | null> {
    return this.session ? structuredClone(this.session) : null;
  }

  async saveSession(session: LedgerSession): Promise<void> {
    this.session = structuredClone(session);
  }

  // ==================== Test Helper Methods ====================

  setSession(session: LedgerSession | null): void {
    this.session = session;
  }

  getSession(): LedgerSession | null {
    return this.session;
  }

  clear(): void {
    this.session = null;
  }
}
