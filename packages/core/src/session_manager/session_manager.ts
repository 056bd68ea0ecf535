/**
 * SessionManager - Local Session State Manager
 *
 * Provides typed access to the machine-local session (.session.json).
 * Uses SessionStore abstraction for backend-agnostic persistence.
 */

import type { SessionStore } from '../session_store/session_store';
import type { Principal } from '../types';
import { assertPrincipal } from '../validation/media_validator';
import type { ISessionManager, LedgerSession } from './session_manager.types';

/**
 * Session Manager Class
 *
 * @example
 * ```typescript
 * // Production usage
 * import { FsSessionStore } from '@medialedger/core/fs';
 * const sessionManager = new SessionManager(new FsSessionStore('/path/to/ledger'));
 *
 * // Test usage
 * import { MemorySessionStore } from '@medialedger/core/memory';
 * const sessionManager = new SessionManager(new MemorySessionStore());
 * ```
 */
export class SessionManager implements ISessionManager {
  private readonly sessionStore: SessionStore;
  private readonly now: () => Date;

  constructor(sessionStore: SessionStore, now: () => Date = () => new Date()) {
    this.sessionStore = sessionStore;
    this.now = now;
  }

  async loadSession(): Promise<LedgerSession | null> {
    return this.sessionStore.loadSession();
  }

  async getActivePrincipal(): Promise<Principal | null> {
    const session = await this.loadSession();
    return session?.activePrincipal ?? null;
  }

  /**
   * [EARS-B1] Throws InvalidPrincipalError before touching the session
   * [EARS-B2] Records the switch in lastSession
   */
  async setActivePrincipal(principal: Principal): Promise<void> {
    assertPrincipal(principal);
    const session = (await this.loadSession()) ?? {};
    await this.sessionStore.saveSession({
      ...session,
      activePrincipal: principal,
      lastSession: {
        principal,
        timestamp: this.now().toISOString()
      }
    });
  }

  async clearActivePrincipal(): Promise<void> {
    const session = await this.loadSession();
    if (!session) return;
    const { activePrincipal: _cleared, ...rest } = session;
    await this.sessionStore.saveSession(rest);
  }

  async getLastSession(): Promise<{ principal: Principal; timestamp: string } | null> {
    const session = await this.loadSession();
    return session?.lastSession ?? null;
  }
}
