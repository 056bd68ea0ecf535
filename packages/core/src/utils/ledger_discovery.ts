/**
 * Ledger Discovery Utilities
 *
 * Filesystem-based utilities for locating the ledger directory.
 * Used at CLI bootstrap to resolve the ledger root before injecting it via DI.
 *
 * NOTE: Core modules receive the ledger root via constructor injection.
 */

import * as path from 'path';
import { existsSync } from 'fs';

/** Directory holding all persisted ledger state, relative to the ledger root */
export const LEDGER_DIR = '.medialedger';

export function getLedgerPath(ledgerRoot: string): string {
  return path.join(ledgerRoot, LEDGER_DIR);
}

export function isLedgerRoot(ledgerRoot: string): boolean {
  return existsSync(getLedgerPath(ledgerRoot));
}

/**
 * Finds the ledger root by searching upwards for a .medialedger directory.
 *
 * @param startPath - Starting path (default: process.cwd())
 * @returns Path to ledger root, or null if not found
 */
export function findLedgerRoot(startPath: string = process.cwd()): string | null {
  let currentPath = path.resolve(startPath);
  while (currentPath !== path.parse(currentPath).root) {
    if (isLedgerRoot(currentPath)) {
      return currentPath;
    }
    currentPath = path.dirname(currentPath);
  }

  // Final check at the root directory
  return isLedgerRoot(currentPath) ? currentPath : null;
}
