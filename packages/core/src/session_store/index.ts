/**
 * SessionStore - Session state persistence abstraction
 *
 * IMPORTANT: This module only exports the interface.
 * For implementations, use:
 * - @medialedger/core/fs for FsSessionStore
 * - @medialedger/core/memory for MemorySessionStore
 */

// Interface only - NO implementation re-exports
export type { SessionStore } from './session_store';
