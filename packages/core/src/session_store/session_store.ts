/**
 * SessionStore - Session persistence abstraction
 *
 * Interface for storing and retrieving local session state (.session.json).
 *
 * Implementations:
 * - FsSessionStore: Filesystem-based (production)
 * - MemorySessionStore: In-memory (tests)
 */

import type { LedgerSession } from '../session_manager/session_manager.types';

export interface SessionStore {
  /**
   * Load session state from storage.
   *
   * @returns LedgerSession object or null if not found
   */
  loadSession(): Promise<LedgerSession | null>;

  /**
   * Save session state to storage.
   */
  saveSession(session: LedgerSession): Promise<void>;
}
