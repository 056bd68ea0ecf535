/**
 * SessionManager Types
 */

import type { Principal } from '../types';

/**
 * Machine-local session state stored in .medialedger/.session.json
 */
export type LedgerSession = {
  /** Principal that CLI calls are issued as */
  activePrincipal?: Principal;
  lastSession?: {
    principal: Principal;
    timestamp: string; // ISO 8601
  };
};

/**
 * ISessionManager interface
 *
 * Session state is ephemeral, machine-local and never shared.
 */
export interface ISessionManager {
  loadSession(): Promise<LedgerSession | null>;

  /**
   * Principal recorded by the last `principal use`, or null
   */
  getActivePrincipal(): Promise<Principal | null>;

  /**
   * Validates and records the active principal
   */
  setActivePrincipal(principal: Principal): Promise<void>;

  clearActivePrincipal(): Promise<void>;

  /**
   * Get last session info (last principal who switched in)
   */
  getLastSession(): Promise<{ principal: Principal; timestamp: string } | null>;
}
