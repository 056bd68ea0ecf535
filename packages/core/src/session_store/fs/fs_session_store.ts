/**
 * FsSessionStore - Filesystem implementation of SessionStore
 *
 * Handles persistence of .medialedger/.session.json.
 * Session files are machine-local.
 */

import * as path from 'path';
import type { SessionStore } from '../session_store';
import type { LedgerSession } from '../../session_manager/session_manager.types';
import { SessionManager } from '../../session_manager/session_manager';
import { DetailedValidationError } from '../../record_schemas/errors';
import { isLedgerSession, validateLedgerSessionDetailed } from '../../validation/record_validator';
import { getLedgerPath } from '../../utils/ledger_discovery';
import { readJsonFile, writeJsonFile } from '../../utils/json_file';

/**
 * @example
 * ```typescript
 * const store = new FsSessionStore('/path/to/ledger');
 * const session = await store.loadSession();
 * console.log(session?.activePrincipal);
 * ```
 */
export class FsSessionStore implements SessionStore {
  private readonly sessionPath: string;

  constructor(ledgerRootPath: string) {
    this.sessionPath = path.join(getLedgerPath(ledgerRootPath), '.session.json');
  }

  /**
   * [EARS-A1] Returns the LedgerSession for valid files
   * [EARS-A2] Returns null for non-existent files
   * [EARS-A3] Throws DetailedValidationError for files that fail the schema
   */
  async loadSession(): Promise<LedgerSession | null> {
    const data = await readJsonFile(this.sessionPath);
    if (data === null) return null;
    if (!isLedgerSession(data)) {
      throw new DetailedValidationError('LedgerSession', validateLedgerSessionDetailed(data).errors);
    }
    return data;
  }

  /**
   * [EARS-B1] Writes .session.json with JSON indentation
   */
  async saveSession(session: LedgerSession): Promise<void> {
    await writeJsonFile(this.sessionPath, session);
  }
}

/**
 * Create a SessionManager backed by FsSessionStore.
 */
export function createSessionManager(ledgerRoot: string): SessionManager {
  return new SessionManager(new FsSessionStore(ledgerRoot));
}
