/**
 * Error taxonomy for registry calls.
 *
 * Every error a call can be rejected with extends LedgerCallError. The host
 * turns these into `err` results; anything else (I/O, corrupted state) is
 * propagated as a thrown error.
 */

import { MediaLedgerError } from '../types/common.types';
import type { Principal, RecordId } from '../types/common.types';
import { MEDIA_FIELD_LIMITS } from '../validation/limits';

export type LedgerErrorKind = 'authorization' | 'validation' | 'existence' | 'reserved';

export const LEDGER_ERROR_CODES = {
  OWNERSHIP_VIOLATION: 'OWNERSHIP_VIOLATION',
  ACCESS_RESTRICTED: 'ACCESS_RESTRICTED',
  VIEW_LIMITED: 'VIEW_LIMITED',
  MISSING_RECORD: 'MISSING_RECORD',
  DUPLICATE_ENTRY: 'DUPLICATE_ENTRY',
  INVALID_NAME: 'INVALID_NAME',
  INVALID_SIZE: 'INVALID_SIZE',
  MALFORMED_LABEL: 'MALFORMED_LABEL',
  INVALID_PRINCIPAL: 'INVALID_PRINCIPAL',
} as const;

export type LedgerErrorCode = typeof LEDGER_ERROR_CODES[keyof typeof LEDGER_ERROR_CODES];

/**
 * Base class for errors that reject a single call without side effects.
 */
export class LedgerCallError extends MediaLedgerError {
  constructor(
    message: string,
    public readonly code: LedgerErrorCode,
    public readonly kind: LedgerErrorKind
  ) {
    super(message, code);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ─────────────────────────────────────────────────────────
// Authorization
// ─────────────────────────────────────────────────────────

/**
 * Caller is not the record's current owner.
 */
export class OwnershipViolationError extends LedgerCallError {
  constructor(public readonly recordId: RecordId, public readonly caller: Principal) {
    super(
      `${caller} is not the owner of media record ${recordId}`,
      LEDGER_ERROR_CODES.OWNERSHIP_VIOLATION,
      'authorization'
    );
  }
}

/**
 * Reserved: no operation produces this yet.
 */
export class AccessRestrictedError extends LedgerCallError {
  constructor(recordId: RecordId, principal: Principal) {
    super(
      `${principal} has no access to media record ${recordId}`,
      LEDGER_ERROR_CODES.ACCESS_RESTRICTED,
      'authorization'
    );
  }
}

/**
 * Reserved: no operation produces this yet.
 */
export class ViewLimitedError extends LedgerCallError {
  constructor(recordId: RecordId, principal: Principal) {
    super(
      `${principal} may not view media record ${recordId}`,
      LEDGER_ERROR_CODES.VIEW_LIMITED,
      'authorization'
    );
  }
}

// ─────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────

export class InvalidNameError extends LedgerCallError {
  constructor(public readonly field: 'name' | 'summary', value: string) {
    super(
      `${field} must be between ${MEDIA_FIELD_LIMITS[field].min} and ${MEDIA_FIELD_LIMITS[field].max} characters (got ${[...value].length})`,
      LEDGER_ERROR_CODES.INVALID_NAME,
      'validation'
    );
  }
}

export class InvalidSizeError extends LedgerCallError {
  constructor(public readonly value: number) {
    super(
      `byteCount must be an integer greater than ${MEDIA_FIELD_LIMITS.byteCount.exclusiveMin} and less than ${MEDIA_FIELD_LIMITS.byteCount.exclusiveMax} (got ${value})`,
      LEDGER_ERROR_CODES.INVALID_SIZE,
      'validation'
    );
  }
}

export class MalformedLabelError extends LedgerCallError {
  constructor(detail: string) {
    super(`Malformed labels: ${detail}`, LEDGER_ERROR_CODES.MALFORMED_LABEL, 'validation');
  }
}

export class InvalidPrincipalError extends LedgerCallError {
  constructor(public readonly value: string) {
    super(`Invalid principal: "${value}"`, LEDGER_ERROR_CODES.INVALID_PRINCIPAL, 'validation');
  }
}

// ─────────────────────────────────────────────────────────
// Existence
// ─────────────────────────────────────────────────────────

export class RecordNotFoundError extends LedgerCallError {
  constructor(public readonly recordId: RecordId) {
    super(`Media record ${recordId} not found`, LEDGER_ERROR_CODES.MISSING_RECORD, 'existence');
  }
}

/**
 * Reserved: identifiers are sequence-assigned, so a collision cannot occur.
 */
export class DuplicateEntryError extends LedgerCallError {
  constructor(recordId: RecordId) {
    super(`Media record ${recordId} already exists`, LEDGER_ERROR_CODES.DUPLICATE_ENTRY, 'reserved');
  }
}

export function isLedgerCallError(error: unknown): error is LedgerCallError {
  return error instanceof LedgerCallError;
}
