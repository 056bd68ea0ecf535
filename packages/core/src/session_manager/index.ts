/**
 * SessionManager Module
 *
 * Provides typed access to the machine-local session (.session.json).
 */

// Types
export type { LedgerSession, ISessionManager } from './session_manager.types';

// Implementation
export { SessionManager } from './session_manager';

// Persistence abstraction
export type { SessionStore } from '../session_store';
